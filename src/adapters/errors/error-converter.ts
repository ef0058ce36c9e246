import { ClientError, ProtocolError, TransportError } from "./client-errors";

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

/**
 * Normalises anything thrown while talking to a provider into the client
 * taxonomy. Unknown errors from fetch / stream reads are transport failures;
 * JSON syntax errors are protocol failures.
 */
export function toClientError(error: unknown): ClientError {
  if (error instanceof ClientError) return error;
  if (error instanceof SyntaxError) {
    return new ProtocolError(`Malformed payload: ${error.message}`, { cause: error });
  }
  if (error instanceof Error) {
    return new TransportError(error.message || error.name, { cause: error });
  }
  return new TransportError(String(error));
}

export type ErrorSummary = {
  name: string;
  code: string;
  message: string;
  retryable: boolean;
};

export function summarizeError(error: ClientError): ErrorSummary {
  return {
    name: error.name,
    code: error.code,
    message: error.message,
    retryable: error.retryable,
  };
}
