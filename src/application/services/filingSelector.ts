import type { BulkFilingRow } from "../../core/entities/issuer";

/**
 * Orders two rows of the same issuer: later receipt first, then higher version.
 * Equal keys compare as zero so the earlier source row keeps precedence.
 */
const compareRecency = (left: BulkFilingRow, right: BulkFilingRow): number => {
  const byReceipt = right.receivedAt.getTime() - left.receivedAt.getTime();
  if (byReceipt !== 0) {
    return byReceipt;
  }

  return right.version - left.version;
};

/**
 * Picks exactly one authoritative filing per issuer tax id from an unordered bulk table.
 * Output is sorted by tax id so repeated runs over the same input yield the same sequence.
 */
export const selectLatestFilings = (rows: readonly BulkFilingRow[]): BulkFilingRow[] => {
  const winners = new Map<string, BulkFilingRow>();

  for (const row of rows) {
    const current = winners.get(row.taxId);
    if (!current || compareRecency(row, current) < 0) {
      winners.set(row.taxId, row);
    }
  }

  return Array.from(winners.values()).sort((left, right) =>
    left.taxId < right.taxId ? -1 : left.taxId > right.taxId ? 1 : 0,
  );
};
