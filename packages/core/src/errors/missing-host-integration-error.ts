/**
 * Raised at setup time when synchronization is requested without the
 * debugger integration it needs. Nothing is initialized in that case.
 */
export class MissingHostIntegrationError extends Error {
  public constructor(integration: string) {
    super(`${integration} not found. Synchronization was not initialized.`);
    this.name = 'MissingHostIntegrationError';
    Object.setPrototypeOf(this, MissingHostIntegrationError.prototype);
  }
}
