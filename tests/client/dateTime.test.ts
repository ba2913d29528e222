import {
  assertTimeZone,
  formatEpochMs,
  formatOtpDate,
  formatOtpTime,
  systemTimeZone,
} from "../../src/client/dateTime";

describe("OTP date and time formatting", () => {
  const date = new Date("2025-06-15T08:30:00.000Z");

  it("formats the date as MM-dd-yyyy in the given zone", () => {
    expect(formatOtpDate(date, "UTC")).toBe("06-15-2025");
    expect(formatOtpDate(new Date("2025-06-15T23:30:00.000Z"), "Asia/Tokyo")).toBe("06-16-2025");
  });

  it("formats the time on a 12-hour clock", () => {
    expect(formatOtpTime(date, "UTC")).toBe("08:30AM");
    expect(formatOtpTime(date, "America/New_York")).toBe("04:30AM");
    expect(formatOtpTime(new Date("2025-06-15T15:05:00.000Z"), "UTC")).toBe("03:05PM");
  });

  it("formats epoch milliseconds as local ISO time", () => {
    expect(formatEpochMs(Date.UTC(2025, 5, 15, 8, 30), "Europe/London")).toBe("2025-06-15T09:30:00+01:00");
  });
});

describe("time zones", () => {
  it("finds the system zone", () => {
    expect(systemTimeZone()).not.toBe("");
  });

  it("rejects an unknown zone", () => {
    expect(() => assertTimeZone("Mars/Olympus")).toThrow("Unknown time zone: Mars/Olympus");
  });

  it("accepts a known zone", () => {
    expect(() => assertTimeZone("Europe/Berlin")).not.toThrow();
  });
});
