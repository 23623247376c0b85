/**
 * Gateway errors
 */

export const ERROR_CODE_DEVELOPER_ALREADY_EXISTS = 'developer.service.DeveloperAlreadyExists';
export const ERROR_CODE_DEVELOPER_DOES_NOT_EXIST = 'developer.service.DeveloperDoesNotExist';

export interface ApiExceptionDetails {
  status?: number;
  code?: string;
  body?: string;
  cause?: unknown;
}

/**
 * A management API call failed, either in transport or with a non-2xx
 * response.
 */
export class ApiException extends Error {
  readonly status?: number;
  readonly code?: string;
  readonly body?: string;

  constructor(message: string, details: ApiExceptionDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'ApiException';
    this.status = details.status;
    this.code = details.code;
    this.body = details.body;
  }
}

/**
 * 4xx response from the management API.
 */
export class ClientErrorException extends ApiException {
  constructor(message: string, details: ApiExceptionDetails = {}) {
    super(message, details);
    this.name = 'ClientErrorException';
  }
}

export class DeveloperAlreadyExistsException extends ClientErrorException {
  constructor(email: string, details: ApiExceptionDetails = {}) {
    super(`Developer with ${email} email address already exists.`, {
      ...details,
      code: ERROR_CODE_DEVELOPER_ALREADY_EXISTS,
    });
    this.name = 'DeveloperAlreadyExistsException';
  }
}

/**
 * A local account has no developer on the gateway, either because the
 * site is out of sync or because the lookup failed.
 */
export class DeveloperDoesNotExistException extends Error {
  readonly email: string;

  constructor(email: string) {
    super(`Developer with ${email} email address not found.`);
    this.name = 'DeveloperDoesNotExistException';
    this.email = email;
  }
}
