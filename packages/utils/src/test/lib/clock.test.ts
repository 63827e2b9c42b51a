import { HighResolutionClock, MockClock } from "../../lib/clock";

describe("MockClock", () => {

    test("starts at the initial value", () => {
        expect(new MockClock(500n).nowNanos()).toBe(500n);
    });

    test("only moves when advanced", () => {
        const clock = new MockClock();
        expect(clock.nowNanos()).toBe(1000n);
        expect(clock.nowNanos()).toBe(1000n);

        clock.advance(250);
        expect(clock.nowNanos()).toBe(1250n);
    });
});

describe("HighResolutionClock", () => {

    test("never goes backwards", () => {
        const clock = new HighResolutionClock();
        const first = clock.nowNanos();
        const second = clock.nowNanos();
        expect(second >= first).toBe(true);
    });
});
