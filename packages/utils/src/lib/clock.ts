//
// Monotonic clock with nanosecond resolution.
//
export interface IClock {
    nowNanos(): bigint;
}

export class HighResolutionClock implements IClock {
    nowNanos(): bigint {
        return process.hrtime.bigint();
    }
}

//
// Clock for tests - only moves when told to.
//
export class MockClock implements IClock {
    private current: bigint;

    constructor(initialNanos: bigint = 1000n) {
        this.current = initialNanos;
    }

    nowNanos(): bigint {
        return this.current;
    }

    //
    // Moves the clock forward by the given number of nanoseconds.
    //
    advance(nanos: number): void {
        this.current += BigInt(nanos);
    }
}
