import { PolicyViolationError } from "../core/errors.js";

/**
 * The account is derived from the submitting workgroup at submit time and may
 * not change afterwards. An update that repeats the current account (in any
 * letter case) is accepted.
 */
export function assertAccountUnchanged(incomingAccount: string | null, currentAccount: string | null): void {
  if (!incomingAccount) return;
  if (!currentAccount || incomingAccount.toLowerCase() !== currentAccount.toLowerCase()) {
    throw new PolicyViolationError("Job account cannot be modified after submission");
  }
}
