// ============================================================================
// Failed Bills — Failure Kind Utilities
// ============================================================================

import {
  FAILURE_KIND_CONFIGS,
  UNKNOWN_FAILURE_KIND_COLOR,
  UNKNOWN_FAILURE_KIND_ICON,
  type FailureKind,
} from '../constants/failed-bill.constants.js';

export interface FailureKindDisplay {
  kind: string;
  label: string;
  color: string;
  icon: string;
  /** False for tokens outside the closed FailureKind set. */
  known: boolean;
}

/**
 * Case-sensitive membership test against the closed FailureKind set.
 * Object prototype keys (e.g. "constructor") are not kinds.
 */
export function isFailureKind(token: string): token is FailureKind {
  return Object.prototype.hasOwnProperty.call(FAILURE_KIND_CONFIGS, token);
}

/**
 * Display metadata for a failure kind token.
 *
 * Never throws: tokens from newer upstream releases render with the token as
 * their label and the neutral color/icon.
 */
export function describeFailureKind(token: string): FailureKindDisplay {
  if (isFailureKind(token)) {
    const config = FAILURE_KIND_CONFIGS[token];
    return {
      kind: token,
      label: config.label,
      color: config.color,
      icon: config.icon,
      known: true,
    };
  }

  return {
    kind: token,
    label: token,
    color: UNKNOWN_FAILURE_KIND_COLOR,
    icon: UNKNOWN_FAILURE_KIND_ICON,
    known: false,
  };
}
