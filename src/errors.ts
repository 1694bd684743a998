/**
 * Base error for everything thrown by the SDK
 */
export class PeppolSdkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PeppolSdkError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Input data does not satisfy the document contract
 * (malformed Peppol identifiers, negative amounts, missing names, ...)
 */
export class PeppolValidationError extends PeppolSdkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PeppolValidationError';
  }
}

/**
 * The attachment file could not be read
 */
export class PeppolAttachmentError extends PeppolSdkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PeppolAttachmentError';
  }
}

/**
 * The XML encoder rejected the assembled document
 */
export class PeppolSerializationError extends PeppolSdkError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PeppolSerializationError';
  }
}

/**
 * HTTP level failure while talking to a validation service
 */
export class PeppolApiError extends PeppolSdkError {
  public readonly statusCode?: number;
  public readonly responseBody?: string;

  constructor(message: string, statusCode?: number, responseBody?: string) {
    super(message);
    this.name = 'PeppolApiError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

export class PeppolAuthenticationError extends PeppolSdkError {
  constructor(message: string) {
    super(message);
    this.name = 'PeppolAuthenticationError';
  }
}

export class PeppolNotFoundError extends PeppolSdkError {
  constructor(message: string) {
    super(message);
    this.name = 'PeppolNotFoundError';
  }
}

/**
 * XML handed to one of the parsing helpers could not be read
 */
export class PeppolXmlParsingError extends PeppolSdkError {
  public readonly rawResponse?: string;

  constructor(message: string, rawResponse?: string) {
    super(message);
    this.name = 'PeppolXmlParsingError';
    this.rawResponse = rawResponse;
  }
}
