/**
 * Processing policies
 *
 * Every orchestration entry point resolves its flags into one
 * ProcessingPolicy up front; the per-mode rules below are the only place
 * that decides what a mode may skip, delete or reset.
 */

import type { ProcessingMode, ProcessingPolicy } from '../../types/services';

export interface ModeRules {
  /** Skip a pair whose events are all processed and whose summary exists */
  skipWhenUpToDate: boolean;
  /** Skip a pair that already has sessions or a summary */
  skipWhenDataExists: boolean;
  /** Skip a pair that has no events at all (after any purge) */
  skipWhenNoEvents: boolean;
  /** Delete every session (manual ones too) and the summary first */
  purgeExisting: boolean;
  /** Clear processed flags before re-deriving */
  resetProcessedFlags: boolean;
  /** Needs explicit confirmation outside dry-run */
  destructive: boolean;
}

export const MODE_RULES: Readonly<Record<ProcessingMode, ModeRules>> = {
  incremental: {
    skipWhenUpToDate: true,
    skipWhenDataExists: false,
    skipWhenNoEvents: false,
    purgeExisting: false,
    resetProcessedFlags: false,
    destructive: false,
  },
  reprocess: {
    skipWhenUpToDate: false,
    skipWhenDataExists: false,
    skipWhenNoEvents: false,
    purgeExisting: false,
    resetProcessedFlags: false,
    destructive: false,
  },
  rebuild: {
    skipWhenUpToDate: false,
    skipWhenDataExists: true,
    skipWhenNoEvents: true,
    purgeExisting: false,
    resetProcessedFlags: false,
    destructive: false,
  },
  force_rebuild: {
    skipWhenUpToDate: false,
    skipWhenDataExists: false,
    skipWhenNoEvents: true,
    purgeExisting: true,
    resetProcessedFlags: true,
    destructive: true,
  },
};

export function rulesFor(policy: ProcessingPolicy): ModeRules {
  return MODE_RULES[policy.mode];
}

export function createPolicy(mode: ProcessingMode, flags: { dryRun?: boolean; verbose?: boolean } = {}): ProcessingPolicy {
  return Object.freeze({
    mode,
    dryRun: flags.dryRun ?? false,
    verbose: flags.verbose ?? false,
  });
}

/**
 * Policy for the batch processor: force_process means reprocess
 */
export function resolveBatchPolicy(flags: { forceProcess?: boolean; dryRun?: boolean; verbose?: boolean }): ProcessingPolicy {
  return createPolicy(flags.forceProcess ? 'reprocess' : 'incremental', flags);
}

/**
 * Policy for the rebuild controller
 */
export function resolveRebuildPolicy(flags: { forceRebuild?: boolean; dryRun?: boolean; verbose?: boolean }): ProcessingPolicy {
  return createPolicy(flags.forceRebuild ? 'force_rebuild' : 'rebuild', flags);
}

/**
 * True when running this policy for real deletes data and needs confirmation
 */
export function requiresConfirmation(policy: ProcessingPolicy): boolean {
  return rulesFor(policy).destructive && !policy.dryRun;
}
