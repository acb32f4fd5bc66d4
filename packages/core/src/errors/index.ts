/**
 * Custom Error Classes
 *
 * Fatal errors unwind to the top of the session and end the run; recoverable
 * ones are caught at the orchestrator boundary and counted.
 */

import type { TrackState } from '../stateMachine.js';

/**
 * Base error class for all hires-dl errors
 */
export class HiresDlError extends Error {
  public readonly code: string;
  public readonly fatal: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    fatal: boolean,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'HiresDlError';
    this.code = code;
    this.fatal = fatal;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Bad credentials or expired token
 */
export class AuthenticationError extends HiresDlError {
  constructor(message: string) {
    super(message, 'AUTHENTICATION_ERROR', true);
    this.name = 'AuthenticationError';
  }
}

/**
 * Account has no streaming entitlement
 */
export class IneligibleError extends HiresDlError {
  constructor(message = 'This account is not eligible for streaming') {
    super(message, 'INELIGIBLE_ACCOUNT', true);
    this.name = 'IneligibleError';
  }
}

export class InvalidAppIdError extends HiresDlError {
  constructor(message = 'The app id was rejected; re-provision the application credentials') {
    super(message, 'INVALID_APP_ID', true);
    this.name = 'InvalidAppIdError';
  }
}

export class InvalidAppSecretError extends HiresDlError {
  constructor(message = 'The app secret is invalid or has expired; re-provision the application credentials') {
    super(message, 'INVALID_APP_SECRET', true);
    this.name = 'InvalidAppSecretError';
  }
}

export class InvalidQualityError extends HiresDlError {
  constructor(quality: unknown) {
    super(
      `Invalid quality id ${String(quality)}: choose from 5, 6, 7 or 27`,
      'INVALID_QUALITY',
      true,
      { quality }
    );
    this.name = 'InvalidQualityError';
  }
}

/**
 * Raised when the session is interrupted
 */
export class CancelledError extends HiresDlError {
  constructor(message = 'Session cancelled') {
    super(message, 'CANCELLED', true);
    this.name = 'CancelledError';
  }
}

/**
 * Item is not available for streaming
 */
export class NonStreamableError extends HiresDlError {
  constructor(kind: string, id: string) {
    super(`${kind} ${id} is not streamable`, 'NON_STREAMABLE', false, { kind, id });
    this.name = 'NonStreamableError';
  }
}

export class InvalidUrlError extends HiresDlError {
  constructor(url: string) {
    super(`Invalid or unsupported URL: "${url}"`, 'INVALID_URL', false, { url });
    this.name = 'InvalidUrlError';
  }
}

/**
 * Output path template could not be rendered
 */
export class TemplateError extends HiresDlError {
  constructor(message: string, template: string) {
    super(message, 'TEMPLATE_ERROR', false, { template });
    this.name = 'TemplateError';
  }
}

/**
 * Non-2xx answer from an API endpoint
 */
export class RemoteError extends HiresDlError {
  public readonly endpoint: string;
  public readonly status: number;

  constructor(endpoint: string, status: number, message?: string) {
    super(
      message ?? `${endpoint} failed with status ${status}`,
      'REMOTE_ERROR',
      false,
      { endpoint, status }
    );
    this.name = 'RemoteError';
    this.endpoint = endpoint;
    this.status = status;
  }
}

/**
 * Byte transfer of a file failed
 */
export class TransferError extends HiresDlError {
  constructor(url: string, reason: string) {
    super(`Transfer failed: ${reason}`, 'TRANSFER_ERROR', false, { url });
    this.name = 'TransferError';
  }
}

export class StateTransitionError extends HiresDlError {
  constructor(trackId: string, from: TrackState, to: TrackState) {
    super(
      `Invalid state transition from ${from} to ${to}`,
      'STATE_TRANSITION_ERROR',
      false,
      { trackId, from, to }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * Fatal errors end the session; anything else is a per-item failure
 */
export function isFatalError(error: unknown): boolean {
  return error instanceof HiresDlError && error.fatal;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
