/**
 * Natural-language due dates.
 *
 * Turns phrases like "30 days", "in 2 weeks", "net 15", "tomorrow" or
 * "April 12th" into a `YYYY-MM-DD` calendar date relative to today.
 *
 * Rules are tried in a fixed order and the first match wins:
 *
 * 1. Counted offsets: `N day(s)`, `N week(s)` (7N days), `N month(s)` (30N days)
 * 2. Phrases: `next week` (+7), `next month` (+30), `tomorrow` (+1)
 * 3. Payment terms: `net N` (+N days)
 * 4. Absolute dates via chrono-node, ordinals stripped first. When the phrase
 *    names a month and day but no year and that date has already passed, it
 *    is moved to next year (a Feb 29 with no next-year counterpart is
 *    rejected). A bare weekday that has passed means the one next week.
 *
 * Months are always 30 days here. Calendar-accurate month arithmetic would
 * change every "N months" answer.
 *
 * @module date-normalizer
 */

import * as chrono from "chrono-node";

const DAY_PATTERN = /(?:in\s+)?(\d+)\s*days?/;
const WEEK_PATTERN = /(?:in\s+)?(\d+)\s*weeks?/;
const MONTH_PATTERN = /(?:in\s+)?(\d+)\s*months?/;
const NET_TERMS_PATTERN = /net\s*(\d+)/;
const ORDINAL_SUFFIX = /(\d+)(st|nd|rd|th)/g;

const PHRASE_OFFSETS: Array<[phrase: string, days: number]> = [
    ["next week", 7],
    ["next month", 30],
    ["tomorrow", 1],
];

function addDays(from: Date, days: number): Date {
    return new Date(from.getFullYear(), from.getMonth(), from.getDate() + days);
}

function startOfDay(date: Date): Date {
    return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

/** Local calendar date as `YYYY-MM-DD`. */
export function formatIsoDate(date: Date): string {
    const year = String(date.getFullYear()).padStart(4, "0");
    const month = String(date.getMonth() + 1).padStart(2, "0");
    const day = String(date.getDate()).padStart(2, "0");
    return `${year}-${month}-${day}`;
}

function relativeOffset(text: string): number | null {
    const counted: Array<[RegExp, number]> = [
        [DAY_PATTERN, 1],
        [WEEK_PATTERN, 7],
        [MONTH_PATTERN, 30],
    ];
    for (const [pattern, unit] of counted) {
        const match = pattern.exec(text);
        if (match) {
            return Number(match[1]) * unit;
        }
    }

    for (const [phrase, days] of PHRASE_OFFSETS) {
        if (text.includes(phrase)) {
            return days;
        }
    }

    const net = NET_TERMS_PATTERN.exec(text);
    if (net) {
        return Number(net[1]);
    }

    return null;
}

function sameCalendarDay(date: Date, month: number, day: number): boolean {
    return date.getMonth() + 1 === month && date.getDate() === day;
}

function absoluteDate(text: string, today: Date): Date | null {
    const cleaned = text.replace(ORDINAL_SUFFIX, "$1");
    const [result] = chrono.parse(cleaned, today);
    if (!result) {
        return null;
    }

    const { start } = result;
    let parsed = startOfDay(start.date());
    if (Number.isNaN(parsed.getTime())) {
        return null;
    }

    const month = start.get("month");
    const day = start.get("day");
    if (month === null || day === null || !sameCalendarDay(parsed, month, day)) {
        return null;
    }

    if (parsed >= today || start.isCertain("year")) {
        return parsed;
    }

    // A bare weekday resolves to the nearest one, which may already be behind us.
    if (start.isCertain("weekday") && !start.isCertain("day")) {
        return addDays(parsed, 7);
    }

    if (start.isCertain("month") && start.isCertain("day")) {
        parsed = new Date(parsed.getFullYear() + 1, parsed.getMonth(), parsed.getDate());
        return sameCalendarDay(parsed, month, day) ? parsed : null;
    }
    return parsed;
}

/**
 * Normalize a due-date phrase. Returns `null` for empty or non-string input
 * and for anything that does not read as a date.
 *
 * @param now - Reference clock; defaults to the current time.
 */
export function normalizeDate(input: unknown, now: Date = new Date()): string | null {
    if (typeof input !== "string") {
        return null;
    }

    const text = input.trim().toLowerCase();
    if (!text) {
        return null;
    }

    const today = startOfDay(now);

    const offset = relativeOffset(text);
    if (offset !== null) {
        const target = addDays(today, offset);
        return Number.isNaN(target.getTime()) ? null : formatIsoDate(target);
    }

    const absolute = absoluteDate(text, today);
    return absolute ? formatIsoDate(absolute) : null;
}
