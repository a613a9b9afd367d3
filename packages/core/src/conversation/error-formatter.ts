import type { Operation } from "effection";
import type { MessagePromise } from "../promises/message-promise.ts";

export interface FormattedError {
  readonly text: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/**
 * Turns an error sent into a conversation into message text and metadata.
 * `preceding` is the message the error message will follow, if any.
 */
export interface ErrorFormatter {
  format(error: Error, preceding: MessagePromise | undefined): Operation<FormattedError>;
}

export const defaultErrorFormatter: ErrorFormatter = {
  *format(error: Error): Operation<FormattedError> {
    return {
      text: `${error.name}: ${error.message}`,
      metadata: { errorType: error.name },
    };
  },
};
