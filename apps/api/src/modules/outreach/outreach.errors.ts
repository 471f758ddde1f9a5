export class OutreachNotConfiguredError extends Error {
  constructor(message = 'Email outreach is not configured') {
    super(message);
    this.name = 'OutreachNotConfiguredError';
  }
}

export class ProductVisionMissingError extends Error {
  constructor(message = 'product_vision is required when no default product vision is configured') {
    super(message);
    this.name = 'ProductVisionMissingError';
  }
}

export class EmailGenerationError extends Error {
  readonly retryable: boolean;

  constructor(message: string, retryable: boolean) {
    super(message);
    this.name = 'EmailGenerationError';
    this.retryable = retryable;
  }
}

export class EmailDeliveryError extends Error {
  readonly retryable: boolean;

  constructor(message: string, retryable: boolean) {
    super(message);
    this.name = 'EmailDeliveryError';
    this.retryable = retryable;
  }
}
