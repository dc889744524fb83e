import { InvalidRequestError } from "../core/errors.js";

const COUNT_PATTERN = /^[0-9]+$/;

function parseCount(token: string, entry: string): number {
  if (!COUNT_PATTERN.test(token)) {
    throw new InvalidRequestError(`Invalid GPU count "${token}" in GRES request "${entry}"`);
  }
  return Number(token);
}

/**
 * Sums the GPUs requested in a GRES string such as `gpu:2,gpu:p100:1`. Accepts
 * `gpu`, `gpu:<count>`, `gpu:<type>` and `gpu:<type>:<count>`, optionally
 * prefixed with `gres:` or `gres/`. Non-GPU entries count as zero.
 */
export function countRequestedGpus(gresSpec: string, gpuTypes: readonly string[]): number {
  let total = 0;

  for (const rawEntry of gresSpec.split(",")) {
    const entry = rawEntry.trim().replace(/^gres[:/]/, "");
    if (entry.length === 0) continue;

    const parts = entry.split(":");
    if (parts[0] !== "gpu") continue;

    if (parts.length === 1) {
      total += 1;
    } else if (parts.length === 2) {
      const token = parts[1] ?? "";
      total += gpuTypes.includes(token) ? 1 : parseCount(token, entry);
    } else if (parts.length === 3) {
      const type = parts[1] ?? "";
      if (!gpuTypes.includes(type)) {
        throw new InvalidRequestError(`Unknown GPU type "${type}" in GRES request "${entry}"`);
      }
      total += parseCount(parts[2] ?? "", entry);
    } else {
      throw new InvalidRequestError(`Malformed GRES request "${entry}"`);
    }
  }

  return total;
}
