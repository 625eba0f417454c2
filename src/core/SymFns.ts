import { assert, type Equals } from "tsafe";
import type { Objfile } from "./objfile";

/** Opaque handle on the object file a reader works on. */
export type Bfd = {
    filename: string;
};

export type Section = {
    name: string;
    vma: bigint;
    size: number;
};

export type SectionAddrInfo = {
    addr: bigint;
    name: string;
    sectindex: number;
}[];

export type SymfileSegmentData = {
    segments: { base: bigint; size: number }[];
    segmentInfo: number[];
};

export type Probe = {
    provider: string;
    name: string;
    address: bigint;
};

export type SymProbeFns = {
    getProbes: (objfile: Objfile) => readonly Probe[];
};

/**
 * The functions a symbol reader provides for an objfile.
 * Every slot is optional, a missing slot means the reader does not support it.
 */
export type SymFns = {
    newInit?: (objfile: Objfile) => void;
    init?: (objfile: Objfile) => void;
    read?: (objfile: Objfile, symfileFlags: number) => void;
    finish?: (objfile: Objfile) => void;
    offsets?: (objfile: Objfile, info: SectionAddrInfo) => void;
    /** NOTE: Does not take the objfile, it is only given the bfd. */
    segments?: (abfd: Bfd) => SymfileSegmentData | null;
    readLinetable?: (objfile: Objfile) => void;
    relocate?: (objfile: Objfile, section: Section, buf: Uint8Array) => Uint8Array | null;
    probeFns?: SymProbeFns;
};

export type SymFnName = Exclude<keyof SymFns, "probeFns">;

export const symFnNames = [
    "newInit",
    "init",
    "read",
    "finish",
    "offsets",
    "segments",
    "readLinetable",
    "relocate"
] as const;

assert<Equals<(typeof symFnNames)[number], SymFnName>>();

/** Slots of `sf` that hold a function, `probeFns.getProbes` is listed as "getProbes". */
export function getPresentSymFnNames(sf: SymFns): (SymFnName | "getProbes")[] {
    const names: (SymFnName | "getProbes")[] = symFnNames.filter(name => sf[name] !== undefined);

    if (sf.probeFns !== undefined) {
        names.push("getProbes");
    }

    return names;
}

// Flags passed to `read`.
export const SYMFILE_VERBOSE = 1 << 1;
export const SYMFILE_MAINLINE = 1 << 2;
export const SYMFILE_DEFER_BP_RESET = 1 << 3;
export const SYMFILE_NO_READ = 1 << 4;
