import { UnsupportedDomainError } from "./errors";
import type { Domain } from "./ordering";

export type AlgorithmKind = "sort" | "search";

interface IAlgorithmDescriptorBase {
    //
    // Lookup key, e.g. "quick-sort".
    //
    readonly key: string;

    //
    // Display name, e.g. "Quick Sort".
    //
    readonly name: string;

    readonly timeComplexity: string;
    readonly spaceComplexity: string;

    //
    // Element domains the algorithm accepts.
    //
    readonly domains: readonly Domain[];
}

export interface ISortDescriptor extends IAlgorithmDescriptorBase {
    readonly kind: "sort";

    //
    // Equal elements keep their relative input order.
    //
    readonly stable: boolean;

    //
    // False for distribution sorts that place elements by key.
    //
    readonly comparisonBased: boolean;
}

export interface ISearchDescriptor extends IAlgorithmDescriptorBase {
    readonly kind: "search";

    //
    // The input must already be in ascending order.
    //
    readonly requiresOrderedInput: boolean;

    //
    // Searches a graph view of the array rather than the array itself.
    //
    readonly graphBased: boolean;
}

export type AlgorithmDescriptor = ISortDescriptor | ISearchDescriptor;

export function describeSort(descriptor: Omit<ISortDescriptor, "kind">): ISortDescriptor {
    return Object.freeze({
        ...descriptor,
        kind: "sort" as const,
        domains: Object.freeze([...descriptor.domains]),
    });
}

export function describeSearch(descriptor: Omit<ISearchDescriptor, "kind">): ISearchDescriptor {
    return Object.freeze({
        ...descriptor,
        kind: "search" as const,
        domains: Object.freeze([...descriptor.domains]),
    });
}

export function supportsDomain(descriptor: AlgorithmDescriptor, domain: Domain): boolean {
    return descriptor.domains.includes(domain);
}

//
// Throws UnsupportedDomainError unless the algorithm declares the domain.
//
export function assertDomainSupported(descriptor: AlgorithmDescriptor, domain: Domain): void {
    if (!supportsDomain(descriptor, domain)) {
        throw new UnsupportedDomainError(descriptor.name, domain, descriptor.domains);
    }
}
