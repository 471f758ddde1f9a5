export class CompanyNotFoundError extends Error {
  constructor(message = 'Company not found') {
    super(message);
    this.name = 'CompanyNotFoundError';
  }
}

export class CompanyIntelligenceUnavailableError extends Error {
  readonly upstreamStatus: number | null;

  constructor(message: string, upstreamStatus: number | null) {
    super(message);
    this.name = 'CompanyIntelligenceUnavailableError';
    this.upstreamStatus = upstreamStatus;
  }
}
