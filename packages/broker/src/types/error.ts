export type BrokerErrorCode =
  | 'MALFORMED_INPUT'
  | 'INVALID_REQUEST'
  | 'UNKNOWN_REQUEST_TYPE'
  | 'UNKNOWN_PROVIDER'
  | 'INVALID_CONFIGURATION'
  | 'INVALID_REQUEST_ID'
  | 'TOOL_CALL_NOT_FOUND';

export abstract class BrokerError extends Error {
  override name: string;
  abstract readonly code: BrokerErrorCode;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class MalformedInputError extends BrokerError {
  override readonly code = 'MALFORMED_INPUT';
}

export class InvalidRequestError extends BrokerError {
  override readonly code = 'INVALID_REQUEST';
}

export class UnknownRequestTypeError extends BrokerError {
  override readonly code = 'UNKNOWN_REQUEST_TYPE';
  readonly requestType: string;

  constructor(requestType: string) {
    super(`Unknown request type: ${requestType}`);
    this.requestType = requestType;
  }
}

export class InvalidConfigurationError extends BrokerError {
  override readonly code: BrokerErrorCode = 'INVALID_CONFIGURATION';
}

export class UnknownProviderError extends InvalidConfigurationError {
  override readonly code: BrokerErrorCode = 'UNKNOWN_PROVIDER';
  readonly provider: string;

  constructor(provider: string, known: ReadonlyArray<string>) {
    super(`Invalid provider '${provider}'. Must be one of: ${known.join(', ')}`);
    this.provider = provider;
  }
}

export class InvalidRequestIdError extends BrokerError {
  override readonly code = 'INVALID_REQUEST_ID';
  readonly requestId: string;

  constructor(requestId: string) {
    super('Invalid or expired request_id');
    this.requestId = requestId;
  }
}

export class ToolCallNotFoundError extends BrokerError {
  override readonly code = 'TOOL_CALL_NOT_FOUND';
  readonly requestId: string;
  readonly toolCallId: string;

  constructor(requestId: string, toolCallId: string) {
    super(`Tool call '${toolCallId}' not found for request '${requestId}'`);
    this.requestId = requestId;
    this.toolCallId = toolCallId;
  }
}
