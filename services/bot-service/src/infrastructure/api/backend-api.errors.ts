export class BackendUnavailableError extends Error {
  constructor(
    readonly route: string,
    reason: string,
  ) {
    super(`Backend API request ${route} failed (${reason}).`);
    this.name = 'BackendUnavailableError';
  }
}

export class BackendApiError extends Error {
  constructor(
    readonly route: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`Backend API request ${route} failed (${status})${body ? `: ${body}` : '.'}`);
    this.name = 'BackendApiError';
  }
}
