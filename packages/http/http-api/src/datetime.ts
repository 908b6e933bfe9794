/**
 * Calendar date DTO for JSON payloads.
 *
 * DTOs are plain `{ value }` objects so JSON.stringify/parse round-trip them
 * unchanged; DateUtil holds all conversion logic.
 */

/**
 * A date without time or timezone, as ISO-8601 `YYYY-MM-DD`.
 */
export interface DateDto {
    value: string;
}

export class DateUtil {
    /**
     * @param month - 1-12
     */
    static of(year: number, month: number, day: number): DateDto {
        const monthStr = month.toString().padStart(2, '0');
        const dayStr = day.toString().padStart(2, '0');
        return { value: `${year}-${monthStr}-${dayStr}` };
    }

    /**
     * The UTC calendar date of the given instant.
     */
    static fromDate(date: Date): DateDto {
        return DateUtil.of(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
    }

    static fromString(iso: string): DateDto {
        if (!/^\d{4}-\d{2}-\d{2}$/.test(iso)) {
            throw new Error(`Invalid date format: ${iso}. Expected YYYY-MM-DD`);
        }
        return { value: iso };
    }

    /**
     * Midnight UTC of the date.
     */
    static toDate(dateDto: DateDto): Date {
        return new Date(`${dateDto.value}T00:00:00.000Z`);
    }

    static plusDays(dateDto: DateDto, days: number): DateDto {
        const date = DateUtil.toDate(dateDto);
        date.setUTCDate(date.getUTCDate() + days);
        return DateUtil.fromDate(date);
    }
}
