/**
 * Error taxonomy for the client.
 *
 * Provider text is carried verbatim; nothing here maps status codes to messages.
 */

export class SdkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Missing credentials, a request without endpoint or url, or mutually
 * exclusive parameters given together.
 */
export class ConfigurationError extends SdkError {}

/**
 * Token endpoint rejected an exchange, a refresh was attempted without a
 * refresh token, or the authorization flow failed or timed out.
 */
export class AuthenticationError extends SdkError {
  readonly responseText?: string;

  constructor(message: string, responseText?: string) {
    super(message);
    this.responseText = responseText;
  }
}

/**
 * Non-200 from a REST or stream call, or a malformed JSON body/line.
 */
export class RequestError extends SdkError {
  readonly status: number;
  readonly responseText: string;

  constructor(message: string, status: number, responseText: string) {
    super(message);
    this.status = status;
    this.responseText = responseText;
  }
}
