import { formatInTimeZone } from "date-fns-tz";

/** The date format OTP 1.x expects in the date query parameter. */
export function formatOtpDate(date: Date, timeZone: string): string {
  return formatInTimeZone(date, timeZone, "MM-dd-yyyy");
}

/** The 12-hour clock OTP 1.x expects in the time query parameter, e.g. "08:30AM". */
export function formatOtpTime(date: Date, timeZone: string): string {
  return formatInTimeZone(date, timeZone, "hh:mma");
}

/** OTP reports times as epoch milliseconds; results carry them as local ISO strings. */
export function formatEpochMs(epochMs: number, timeZone: string): string {
  return formatInTimeZone(new Date(epochMs), timeZone, "yyyy-MM-dd'T'HH:mm:ssXXX");
}

export function systemTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

export function assertTimeZone(timeZone: string): void {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
  } catch (err) {
    throw new Error(`Unknown time zone: ${timeZone}`, { cause: err });
  }
}
