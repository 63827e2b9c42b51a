import { HighResolutionClock, type IClock } from "utils";

//
// Point-in-time copy of a metrics counter.
//
export interface IMetricsSnapshot {
    //
    // Element comparisons made through the ordering.
    //
    readonly comparisons: number;

    //
    // Element moves: a swap counts once, so does a single write.
    //
    readonly moves: number;

    //
    // Raw reads and writes of the working array.
    //
    readonly accesses: number;

    //
    // Time between startTiming and stopTiming (or now, while still timing).
    //
    readonly elapsedNanos: number;
}

//
// Counts other than positive whole numbers are ignored.
//
function isIncrement(count: number): boolean {
    return Number.isInteger(count) && count > 0;
}

//
// Passive instrument that an algorithm writes to while it runs.
// Counters only ever go up. One counter per run.
//
export class MetricsCounter {
    private comparisons = 0;
    private moves = 0;
    private accesses = 0;
    private startTime: bigint | undefined;
    private endTime: bigint | undefined;

    constructor(private readonly clock: IClock = new HighResolutionClock()) {
    }

    recordComparison(count: number = 1): void {
        if (isIncrement(count)) {
            this.comparisons += count;
        }
    }

    recordMove(count: number = 1): void {
        if (isIncrement(count)) {
            this.moves += count;
        }
    }

    recordAccess(count: number = 1): void {
        if (isIncrement(count)) {
            this.accesses += count;
        }
    }

    startTiming(): void {
        this.startTime = this.clock.nowNanos();
        this.endTime = undefined;
    }

    stopTiming(): void {
        if (this.startTime === undefined) {
            return;
        }
        this.endTime = this.clock.nowNanos();
    }

    //
    // Zero until timing starts; live while timing runs; fixed once stopped.
    //
    elapsedNanos(): number {
        if (this.startTime === undefined) {
            return 0;
        }
        const end = this.endTime ?? this.clock.nowNanos();
        return Number(end - this.startTime);
    }

    get comparisonCount(): number {
        return this.comparisons;
    }

    get moveCount(): number {
        return this.moves;
    }

    get accessCount(): number {
        return this.accesses;
    }

    snapshot(): IMetricsSnapshot {
        return Object.freeze({
            comparisons: this.comparisons,
            moves: this.moves,
            accesses: this.accesses,
            elapsedNanos: this.elapsedNanos(),
        });
    }
}
