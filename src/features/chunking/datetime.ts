import dayjs from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat.js";

dayjs.extend(customParseFormat);

// Date, optional time, optional zone. The zone is ignored: the wall clock is kept as written.
const ISO_PATTERN = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?(?:Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Formats an ISO-8601 timestamp as e.g. "May 25, 2023 at 01:14 PM".
 * Returns null for anything that is not a valid ISO date.
 */
export function formatSessionDate(raw: string): string | null {
  const match = ISO_PATTERN.exec(raw.trim());
  if (!match) return null;

  const [, date, hours = "00", minutes = "00", seconds = "00"] = match;
  const parsed = dayjs(`${date} ${hours}:${minutes}:${seconds}`, "YYYY-MM-DD HH:mm:ss", true);
  return parsed.isValid() ? parsed.format("MMMM DD, YYYY [at] hh:mm A") : null;
}

/**
 * Prefix prepended to every unit of a session. Unparseable timestamps are
 * embedded verbatim.
 */
export function datetimePrefix(raw: string | null | undefined): string {
  if (!raw) return "";
  const formatted = formatSessionDate(raw);
  return formatted ? `[Conversation on ${formatted}] ` : `[${raw}] `;
}
