import type { ApprovalGate } from './types.js';

/**
 * Approves every change. The default for unattended runs.
 */
export const autoApprove: ApprovalGate = {
  confirm: async () => true,
};

/**
 * Declines every change, so a run only reports what it would do
 */
export const denyAll: ApprovalGate = {
  confirm: async () => false,
};

/**
 * Approves the changes whose description the predicate accepts
 */
export function approveWhen(predicate: (description: string) => boolean | Promise<boolean>): ApprovalGate {
  return {
    confirm: async (description) => predicate(description),
  };
}
