import { MoverSet, StockRecord } from '../types';

/**
 * Split one trading day's records into the top `topN` gainers (largest
 * percent change first) and the top `topN` decliners (smallest first).
 * Both come from one stable descending sort: winners read it from the head,
 * losers from the tail backwards, so the two never share a record while
 * there are at least `2 * topN` records, even with ties.
 */
export function rankMovers(records: readonly StockRecord[], topN: number): MoverSet {
    if (!Number.isInteger(topN) || topN < 1) {
        throw new RangeError(`topN must be a positive integer, got ${topN}`);
    }

    const sorted = [...records].sort((a, b) => b.price_change_pct - a.price_change_pct);
    const winners = sorted.slice(0, topN);
    const losers = sorted.slice(-topN).reverse();

    return {
        date: records.length > 0 ? records[0].date : null,
        winners,
        losers,
    };
}

/** Keep only the records of the most recent date present. */
export function latestTradingDay(records: readonly StockRecord[]): { date: string | null; records: StockRecord[] } {
    if (records.length === 0) return { date: null, records: [] };
    const date = records.reduce((max, r) => (r.date > max ? r.date : max), records[0].date);
    return { date, records: records.filter(r => r.date === date) };
}
