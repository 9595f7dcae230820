import type { Version } from '../../types/version'

import { renderVersion } from '../versions/render-version'
import { BumpError } from './bump-error'

/** Transition rule a version pair violates. */
export type TransitionRule = 'pre-release-boundary' | 'monotonicity'

let ruleMessages: Record<TransitionRule, string> = {
  'pre-release-boundary':
    'switching between pre-release and normal release requires an explicit version',
  monotonicity: 'same version or downgrade not allowed',
}

/** A structurally valid version pair breaks a transition rule. */
export class InvalidTransitionError extends BumpError {
  public readonly rule: TransitionRule
  public readonly current: Version
  public readonly next: Version

  /**
   * Creates a new InvalidTransitionError.
   *
   * @param current - Version before the transition.
   * @param next - Rejected version.
   * @param rule - Violated rule.
   */
  public constructor(current: Version, next: Version, rule: TransitionRule) {
    super(
      'INVALID_TRANSITION',
      `Cannot change version from ${renderVersion(current)} to ` +
        `${renderVersion(next)}: ${ruleMessages[rule]}`,
    )
    this.current = current
    this.rule = rule
    this.next = next
  }
}
