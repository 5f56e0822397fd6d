// NYSE / Nasdaq full-day closures (YYYY-MM-DD)
const US_HOLIDAYS: Set<string> = new Set([
    // 2026
    '2026-01-01',
    '2026-01-19', // MLK Day
    '2026-02-16', // Presidents' Day
    '2026-04-03', // Good Friday
    '2026-05-25', // Memorial Day
    '2026-06-19', // Juneteenth
    '2026-07-03', // July 4 is Sat
    '2026-09-07', // Labor Day
    '2026-11-26', // Thanksgiving
    '2026-12-25',
    // 2027
    '2027-01-01',
    '2027-01-18',
    '2027-02-15',
    '2027-03-26', // Good Friday
    '2027-05-31',
    '2027-06-18', // Juneteenth is Sat
    '2027-07-05', // July 4 is Sun
    '2027-09-06',
    '2027-11-25',
    '2027-12-24', // Christmas is Sat
]);

export class MarketHolidayService {
    /**
     * Check if a date is a US trading day.
     * @param dateStr YYYY-MM-DD
     */
    static isTradingDay(dateStr: string): boolean {
        const day = new Date(`${dateStr}T00:00:00Z`).getUTCDay(); // 0=Sun, 6=Sat
        if (day === 0 || day === 6) return false;
        return !US_HOLIDAYS.has(dateStr);
    }

    static isValidTimeZone(timeZone: string): boolean {
        try {
            new Intl.DateTimeFormat('en-US', { timeZone });
            return true;
        } catch {
            return false;
        }
    }

    /** Calendar date (YYYY-MM-DD) of `now` in the given IANA time zone. */
    static localDate(timeZone: string, now: Date = new Date()): string {
        // en-CA formats as YYYY-MM-DD
        return new Intl.DateTimeFormat('en-CA', {
            timeZone,
            year: 'numeric',
            month: '2-digit',
            day: '2-digit',
        }).format(now);
    }
}
