/**
 * Credential Renewal Policy
 *
 * Decides whether the time-limited credential must be renewed before a run
 * and renews it. Checking fails open toward renewal; renewing fails closed.
 */

import type { AuthorizationSettings, CredentialOutcome, CredentialState } from '@txpublish/core'
import { CredentialRenewalError } from '../errors'
import type { Logger } from '../logger'
import { type CredentialTool, RENEWAL_VALIDITY } from './proxy-tool'

export interface RenewalRequirement {
  /** Minimum remaining lifetime, in seconds. */
  thresholdSeconds: number
  /** Extension attribute the credential must carry. */
  voms?: string
}

/**
 * Pure renewal decision.
 * Renewal is skipped only when the credential exists, lives at least the
 * threshold, and (when an extension attribute is required) the extension
 * lives at least the threshold too.
 */
export function needsRenewal(state: CredentialState, requirement: RenewalRequirement): boolean {
  if (!state.exists || state.timeLeftSeconds < requirement.thresholdSeconds) {
    return true
  }
  if (!requirement.voms) {
    return false
  }
  return (state.extensionTimeLeftSeconds ?? 0) < requirement.thresholdSeconds
}

export class CredentialRenewalPolicy {
  private _log: Logger

  constructor(
    private readonly tool: CredentialTool,
    logger: Logger,
  ) {
    this._log = logger.child({ component: 'CredentialRenewalPolicy' })
  }

  /**
   * Make sure a credential valid for at least `minLifetimeHours` exists.
   * Throws CredentialRenewalError when renewal is needed and fails.
   */
  async ensure(settings: AuthorizationSettings | undefined): Promise<CredentialOutcome> {
    if (!settings) {
      this._log.info('No authorization configured, skipping credential check')
      return 'not-configured'
    }

    const requirement: RenewalRequirement = {
      thresholdSeconds: Math.round(settings.minLifetimeHours * 3600),
      voms: settings.voms,
    }

    let renew: boolean
    try {
      const state = await this.tool.inspect(settings.voms)
      renew = needsRenewal(state, requirement)
      this._log.info({ ...state, thresholdSeconds: requirement.thresholdSeconds, renew }, 'Credential checked')
    } catch (err) {
      this._log.warn({ err }, 'Credential check failed, renewing')
      renew = true
    }

    if (!renew) {
      return 'valid'
    }

    let exitCode: number
    try {
      exitCode = await this.tool.renew({ validity: RENEWAL_VALIDITY, voms: settings.voms })
    } catch (err) {
      throw new CredentialRenewalError('Credential renewal could not be started', { cause: err })
    }
    if (exitCode !== 0) {
      throw new CredentialRenewalError(`Credential renewal failed (exit code ${exitCode})`)
    }

    this._log.info({ validity: RENEWAL_VALIDITY, voms: settings.voms }, 'Credential renewed')
    return 'renewed'
  }
}
