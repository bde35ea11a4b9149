import { describe, expect, it } from "vitest";
import { cleanDateText, normalizeCaptureDate } from "./date-format.js";

describe("cleanDateText", () => {
  it("drops the T separator, fractions and zones", () => {
    expect(cleanDateText("2023-07-14T18:22:05.120+02:00")).toBe("2023-07-14 18:22:05");
    expect(cleanDateText("2023-07-14T18:22:05Z")).toBe("2023-07-14 18:22:05");
    expect(cleanDateText("2023-07-14T18:22:05-05:00")).toBe("2023-07-14 18:22:05");
  });
});

describe("normalizeCaptureDate", () => {
  it("formats EXIF timestamps", () => {
    expect(normalizeCaptureDate("2023:07:14 18:22:05")).toBe("07/14/2023");
    expect(normalizeCaptureDate("2023:07:14")).toBe("07/14/2023");
  });

  it("formats ISO timestamps", () => {
    expect(normalizeCaptureDate("2023-07-14T18:22:05.120+02:00")).toBe("07/14/2023");
    expect(normalizeCaptureDate("2021-12-31")).toBe("12/31/2021");
  });

  it("pads slash dates", () => {
    expect(normalizeCaptureDate("7/4/2021")).toBe("07/04/2021");
    expect(normalizeCaptureDate("07/04/2021 09:15:00")).toBe("07/04/2021");
  });

  it("passes through impossible or unknown dates unchanged", () => {
    expect(normalizeCaptureDate("2023:02:30 10:00:00")).toBe("2023:02:30 10:00:00");
    expect(normalizeCaptureDate("2023:07:14 25:00:00")).toBe("2023:07:14 25:00:00");
    expect(normalizeCaptureDate("sometime in june")).toBe("sometime in june");
  });

  it("returns null for missing input", () => {
    expect(normalizeCaptureDate(null)).toBeNull();
    expect(normalizeCaptureDate("")).toBeNull();
  });
});
