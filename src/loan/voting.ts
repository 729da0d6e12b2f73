import { approvalPct } from "../utils/math.js";

export interface TallyResult {
  approved: boolean;
  approvalPct: number;
  totalVotes: number;
}

/**
 * A request is approved when at least one vote was cast and the truncated
 * approval share reaches `thresholdPct`. No votes means rejection.
 */
export function tallyVotes(votesFor: number, votesAgainst: number, thresholdPct: number): TallyResult {
  const totalVotes = votesFor + votesAgainst;
  const pct = approvalPct(votesFor, votesAgainst);
  return {
    approved: totalVotes > 0 && pct >= thresholdPct,
    approvalPct: pct,
    totalVotes,
  };
}
