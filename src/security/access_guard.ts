import { NotAllowListedError, ScopeNotAllowedError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';

export type ScopeKind = 'namespace' | 'workspace' | 'provider';

export interface AccessGuardOptions {
  allowList?: readonly string[];
  /** Reject every target when the allow list is empty instead of warning. */
  requireAllowList?: boolean;
  logger?: Logger;
}

/**
 * Allow-list precondition check. Runs before any sandbox or publish call and
 * throws; it is never advisory.
 */
export function authorize(
  target: string,
  allowList: readonly string[],
  logger: Logger = createLogger('AccessGuard'),
): void {
  if (allowList.length === 0) {
    logger.warn(`No allow-listed targets configured - allowing ${target}`);
    return;
  }

  if (!allowList.some((allowed) => target.includes(allowed))) {
    logger.error(`Target not allow-listed: ${target}`);
    throw new NotAllowListedError(target);
  }
}

export class AccessGuard {
  private readonly allowList: readonly string[];
  private readonly requireAllowList: boolean;
  private readonly logger: Logger;

  constructor(options: AccessGuardOptions = {}) {
    this.allowList = options.allowList ?? [];
    this.requireAllowList = options.requireAllowList ?? false;
    this.logger = options.logger ?? createLogger('AccessGuard');
  }

  authorize(target: string): void {
    if (this.requireAllowList && this.allowList.length === 0) {
      this.logger.error(`Allow list required but empty - rejecting ${target}`);
      throw new NotAllowListedError(target);
    }
    authorize(target, this.allowList, this.logger);
  }

  /**
   * Exact-match check for Helm namespaces, Terraform workspaces and providers.
   * An empty list leaves the scope unrestricted.
   */
  authorizeScope(kind: ScopeKind, value: string, allowed: readonly string[]): void {
    if (allowed.length === 0) return;
    if (!allowed.includes(value)) {
      this.logger.error(`${kind} not allowed: ${value}`);
      throw new ScopeNotAllowedError(kind, value, allowed);
    }
  }
}
