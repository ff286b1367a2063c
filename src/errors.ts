/**
 * @file errors.ts
 * @description Taxonomie des erreurs wgfleet
 */

export type FleetErrorCode =
  | 'EXHAUSTED'
  | 'DUPLICATE_NAME'
  | 'NOT_FOUND'
  | 'NOT_CONFIGURED'
  | 'UNAVAILABLE'
  | 'CONFLICT'
  | 'UNREACHABLE'
  | 'API_UNREACHABLE'
  | 'INVALID_ADDRESS'
  | 'ADDRESS_IN_USE'
  | 'INVALID_PEER'
  | 'INVALID_POOL'
  | 'CONFIG_INVALID'
  | 'TUNNEL_IO';

/**
 * Erreur fatale pour l'opération en cours.
 * Les erreurs des sources d'enregistrements ne passent pas par ici (voir SourceResult).
 */
export class FleetError extends Error {
  readonly code: FleetErrorCode;

  constructor(code: FleetErrorCode, message: string) {
    super(message);
    this.name = 'FleetError';
    this.code = code;
  }
}

export function isFleetError(error: unknown): error is FleetError {
  return error instanceof FleetError;
}

/**
 * Message lisible pour n'importe quelle valeur capturée
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
