import { describe, expect, it } from "vitest";
import { formatDuration, formatNumber } from "./terminalUI";

describe("terminalUI", () => {
    describe("formatDuration", () => {
        it("should show seconds only below a minute", () => {
            expect(formatDuration(0)).toBe("0s");
            expect(formatDuration(59_999)).toBe("59s");
        });

        it("should show minutes and hours when reached", () => {
            expect(formatDuration(61_000)).toBe("1m 1s");
            expect(formatDuration(2 * 3_600_000 + 15 * 60_000 + 30_000)).toBe(
                "2h 15m 30s",
            );
        });
    });

    describe("formatNumber", () => {
        it("should group thousands", () => {
            expect(formatNumber(48258494)).toBe("48,258,494");
            expect(formatNumber(12)).toBe("12");
        });
    });
});
