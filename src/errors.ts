export const SESSION_NOT_USABLE_MESSAGE =
  "Your ChatGPT session is not usable.\n" +
  "* Log in to ChatGPT in the browser this bridge drives.\n" +
  "* If you think you are already logged in, refresh the session and try again.";

export const READ_FAILURE_MESSAGE =
  "Failed to read response from ChatGPT.  Tips:\n" +
  " * Try again.  ChatGPT can be flaky.\n" +
  " * Refresh your session, and then try again.\n" +
  " * Make sure the browser is still logged in to ChatGPT.";

export const UNUSABLE_RESPONSE_MESSAGE =
  "Unusable response produced, maybe login session expired. Log in again in the browser and refresh the session.";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class BrowserHostError extends Error {
  readonly code: string;
  readonly status: number | null;

  constructor(code: string, detail?: string, status: number | null = null) {
    super(detail ? `${code}: ${detail}` : code);
    this.name = "BrowserHostError";
    this.code = code;
    this.status = status;
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
