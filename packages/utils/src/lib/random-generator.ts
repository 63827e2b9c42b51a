const LOWERCASE_LETTERS = "abcdefghijklmnopqrstuvwxyz";

//
// Source of randomness, injected wherever an algorithm or generator makes a random choice
// so that runs can be replayed with a seeded generator.
//
export interface IRandomGenerator {
    //
    // A number in the range [0, 1).
    //
    random(): number;

    //
    // An integer in the inclusive range [min, max].
    //
    randomInt(min: number, max: number): number;

    //
    // A string of lowercase letters.
    //
    randomString(length: number): string;
}

//
// Picks `length` lowercase letters using the generator's own randomInt.
//
function lettersFrom(generator: IRandomGenerator, length: number): string {
    let result = "";
    for (let i = 0; i < length; i++) {
        result += LOWERCASE_LETTERS[generator.randomInt(0, LOWERCASE_LETTERS.length - 1)];
    }
    return result;
}

export class RandomGenerator implements IRandomGenerator {
    random(): number {
        return Math.random();
    }

    randomInt(min: number, max: number): number {
        return Math.floor(Math.random() * (max - min + 1)) + min;
    }

    randomString(length: number): string {
        return lettersFrom(this, length);
    }
}

//
// Deterministic generator (mulberry32). Two instances created with the same seed
// produce the same sequence.
//
export class SeededRandomGenerator implements IRandomGenerator {
    private state: number;

    constructor(private readonly seed: number = 12345) {
        this.state = seed | 0;
    }

    random(): number {
        this.state = (this.state + 0x6D2B79F5) | 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    randomInt(min: number, max: number): number {
        return Math.floor(this.random() * (max - min + 1)) + min;
    }

    randomString(length: number): string {
        return lettersFrom(this, length);
    }

    //
    // Rewinds to the start of the sequence.
    //
    reset(): void {
        this.state = this.seed | 0;
    }
}
