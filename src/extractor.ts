/**
 * Pulls claim fields out of the submission template. Emoji prefixes and the
 * currency symbol are optional, labels are case-insensitive.
 */

export interface ExtractedClaim {
  username: string;
  transaction_id: string;
  amount: number;
  period_count: number;
  period_unit: string;
}

const USERNAME_RE = /telegram\s+username:\s*@?([A-Za-z0-9_]+)/i;
const TRANSACTION_RE = /transaction\s+id:\s*(\S+)/i;
const AMOUNT_RE = /amount(?:\s+paid)?:\s*[^\d\s]?\s*(\d+)/i;
const PERIOD_RE = /(?:time\s+)?period:\s*(\d+)\s*([A-Za-z]+)/i;

export function extractClaim(text: string): ExtractedClaim | null {
  const username = USERNAME_RE.exec(text);
  const transaction = TRANSACTION_RE.exec(text);
  const amount = AMOUNT_RE.exec(text);
  const period = PERIOD_RE.exec(text);
  if (!username || !transaction || !amount || !period) return null;
  return {
    username: username[1],
    transaction_id: transaction[1],
    amount: Number(amount[1]),
    period_count: Number(period[1]),
    period_unit: period[2],
  };
}

/** Whether the username typed into the claim is the sender's. */
export function usernameMatches(claimed: string, actual: string | undefined): boolean {
  return actual !== undefined && claimed.toLowerCase() === actual.toLowerCase();
}
