export type DossierSetupErrorCode =
  | 'INPUT_UNREADABLE'
  | 'INPUT_EMPTY_WORKBOOK'
  | 'TEMPLATE_UNREADABLE'
  | 'CONFIG_INVALID';

/** Raised before any record is processed; the whole run stops. */
export class DossierSetupError extends Error {
  constructor(
    readonly code: DossierSetupErrorCode,
    detail: string
  ) {
    super(`${code}: ${detail}`);
    this.name = 'DossierSetupError';
  }
}
