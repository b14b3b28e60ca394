import { OAuthErrorCodes, type OAuthError, type OAuthErrorCode } from '@courier-mcp/models';

/** HTTP statuses an OAuth error response is sent with */
export type OAuthErrorStatus = 400 | 401 | 403 | 500;

/**
 * Error that maps onto an OAuth error response (RFC 6749 section 5.2).
 *
 * HTTP handlers answer `status` with `toResponseObject()` as the JSON body.
 */
export class OAuthProtocolError extends Error {
  public readonly error: OAuthErrorCode;
  public readonly errorDescription: string;
  public readonly status: OAuthErrorStatus;

  public constructor(
    error: OAuthErrorCode,
    errorDescription: string,
    status: OAuthErrorStatus = 400,
  ) {
    super(errorDescription);
    this.name = 'OAuthProtocolError';
    this.error = error;
    this.errorDescription = errorDescription;
    this.status = status;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  public toResponseObject(): OAuthError {
    return {
      error: this.error,
      error_description: this.errorDescription,
    };
  }
}

/**
 * Grant failure raised while loading or exchanging codes and refresh tokens
 */
export class TokenError extends OAuthProtocolError {
  public constructor(
    error: typeof OAuthErrorCodes.INVALID_GRANT | typeof OAuthErrorCodes.INVALID_SCOPE,
    errorDescription: string,
  ) {
    super(error, errorDescription, 400);
    this.name = 'TokenError';
  }
}

export class InvalidClientError extends OAuthProtocolError {
  public constructor(errorDescription = 'Client authentication failed') {
    super(OAuthErrorCodes.INVALID_CLIENT, errorDescription, 401);
    this.name = 'InvalidClientError';
  }
}

export class InvalidRequestError extends OAuthProtocolError {
  public constructor(errorDescription: string) {
    super(OAuthErrorCodes.INVALID_REQUEST, errorDescription, 400);
    this.name = 'InvalidRequestError';
  }
}

export class InvalidClientMetadataError extends OAuthProtocolError {
  public constructor(errorDescription: string) {
    super(OAuthErrorCodes.INVALID_CLIENT_METADATA, errorDescription, 400);
    this.name = 'InvalidClientMetadataError';
  }
}

/**
 * Invalid or missing configuration. Fatal at startup.
 */
export class ConfigurationError extends Error {
  public readonly issues: string[];

  public constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
