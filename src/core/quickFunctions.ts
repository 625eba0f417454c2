import type { Objfile } from "./objfile";
import { getStdlog } from "./stdlog";
import { getDebugSymfile } from "./symfileDebug";
import type { Section } from "./SymFns";
import { formatTraceCall, formatTraceResult, NULL_PLACEHOLDER, renderTraceValue } from "./traceRecord";

export type Symtab = {
    filename: string;
    fullname?: string;
};

export type CompunitSymtab = {
    primaryFiletab: Symtab;
};

export type BlockKind = "global" | "static";

/** Index of the block in the blockvector, as printed in trace records. */
const blockIndexByKind: Record<BlockKind, number> = {
    global: 0,
    static: 1
};

export type Domain = "var" | "struct" | "module" | "label" | "common-block";

export type SearchDomain = "variables" | "functions" | "types" | "modules" | "all";

export type Language =
    | "unknown"
    | "auto"
    | "c"
    | "objective-c"
    | "rust"
    | "c++"
    | "d"
    | "go"
    | "fortran"
    | "m2"
    | "asm"
    | "pascal"
    | "opencl"
    | "minimal"
    | "ada";

export type BlockSymbol = {
    name: string;
    domain: Domain;
};

export type MinimalSymbol = {
    linkageName: string;
    address: bigint;
};

/**
 * Lookups a symbol reader provides so that an objfile can be searched
 * without expanding all of its symbol tables.
 */
export type QuickSymbolFunctions = {
    hasSymbols: (objfile: Objfile) => boolean;
    /** True if the symbols can be read lazily, when they are first needed. */
    canLazilyReadSymbols?: () => boolean;
    findLastSourceSymtab: (objfile: Objfile) => Symtab | null;
    forgetCachedSourceInfo: (objfile: Objfile) => void;
    lookupSymbol: (
        objfile: Objfile,
        kind: BlockKind,
        name: string,
        domain: Domain
    ) => CompunitSymtab | null;
    findCompunitSymtabByAddress: (objfile: Objfile, address: bigint) => CompunitSymtab | null;
    /** Calls `callback` on each symtab named `name` until it returns true. */
    mapSymtabsMatchingFilename: (
        objfile: Objfile,
        name: string,
        realPath: string | null,
        callback: (symtab: Symtab) => boolean
    ) => boolean;
    mapMatchingSymbols: (
        objfile: Objfile,
        name: string,
        domain: Domain,
        isGlobal: boolean,
        callback: (symbol: BlockSymbol) => boolean,
        orderedCompare: ((a: string, b: string) => number) | null
    ) => void;
    expandSymtabsMatching: (
        objfile: Objfile,
        fileMatcher: ((filename: string, isBasename: boolean) => boolean) | null,
        lookupName: string | null,
        symbolMatcher: ((symbolName: string) => boolean) | null,
        expansionNotify: ((cust: CompunitSymtab) => void) | null,
        searchDomain: SearchDomain
    ) => void;
    findPcSectCompunitSymtab: (
        objfile: Objfile,
        msymbol: MinimalSymbol | null,
        pc: bigint,
        section: Section | null,
        warnIfReadin: boolean
    ) => CompunitSymtab | null;
    mapSymbolFilenames: (
        objfile: Objfile,
        fun: (filename: string, fullname: string | null) => void,
        needFullname: boolean
    ) => void;
    lookupGlobalSymbolLanguage: (
        objfile: Objfile,
        name: string,
        domain: Domain
    ) => { language: Language; isSymbolFound: boolean };
    expandAllSymtabs: (objfile: Objfile) => void;
    expandSymtabsForFunction: (objfile: Objfile, funcName: string) => void;
    expandSymtabsWithFullname: (objfile: Objfile, fullname: string) => void;
    printStats: (objfile: Objfile, printBcache: boolean) => void;
    dump: (objfile: Objfile) => void;
};

const renderSymtab = (symtab: Symtab | null) =>
    symtab === null ? NULL_PLACEHOLDER : symtab.filename;

const renderCompunitSymtab = (cust: CompunitSymtab | null) =>
    cust === null ? NULL_PLACEHOLDER : cust.primaryFiletab.filename;

function callQuickFunction<R>(params: {
    objfile: Objfile;
    name: Exclude<keyof QuickSymbolFunctions, "canLazilyReadSymbols" | "lookupGlobalSymbolLanguage">;
    renderedArgs: string[];
    call: (qf: QuickSymbolFunctions) => R;
    /** What is returned when the objfile has no quick functions. */
    fallback: R;
    /** Omitted for the functions that return nothing. */
    renderResult?: (result: R) => string;
}): R {
    const { objfile, name, renderedArgs, call, fallback, renderResult } = params;

    if (getDebugSymfile()) {
        getStdlog().write(
            formatTraceCall({
                tableLabel: "qf",
                name,
                debugName: objfile.debugName,
                renderedArgs
            })
        );
    }

    const result = objfile.qf === undefined ? fallback : call(objfile.qf);

    if (getDebugSymfile() && renderResult !== undefined) {
        getStdlog().write(
            formatTraceResult({
                tableLabel: "qf",
                name,
                renderedResult: renderResult(result)
            })
        );
    }

    return result;
}

export function hasPartialSymbols(objfile: Objfile): boolean {
    const { qf } = objfile;

    const retval = (() => {
        if (qf === undefined) {
            return false;
        }

        // Symbols that were not read yet but that can be are considered present.
        if (!objfile.flags.arePartialSymbolsRead && qf.canLazilyReadSymbols?.()) {
            return true;
        }

        return qf.hasSymbols(objfile);
    })();

    if (getDebugSymfile()) {
        getStdlog().write(
            `${formatTraceCall({
                tableLabel: "qf",
                name: "hasSymbols",
                debugName: objfile.debugName,
                renderedArgs: []
            })} = ${renderTraceValue(retval)}`
        );
    }

    return retval;
}

export function findLastSourceSymtab(objfile: Objfile): Symtab | null {
    return callQuickFunction<Symtab | null>({
        objfile,
        name: "findLastSourceSymtab",
        renderedArgs: [],
        call: qf => qf.findLastSourceSymtab(objfile),
        fallback: null,
        renderResult: renderSymtab
    });
}

export function forgetCachedSourceInfo(objfile: Objfile): void {
    callQuickFunction({
        objfile,
        name: "forgetCachedSourceInfo",
        renderedArgs: [],
        call: qf => qf.forgetCachedSourceInfo(objfile),
        fallback: undefined
    });
}

export function lookupSymbol(
    objfile: Objfile,
    params: { kind: BlockKind; name: string; domain: Domain }
): CompunitSymtab | null {
    const { kind, name, domain } = params;

    return callQuickFunction<CompunitSymtab | null>({
        objfile,
        name: "lookupSymbol",
        renderedArgs: [`${blockIndexByKind[kind]}`, renderTraceValue(name), domain],
        call: qf => qf.lookupSymbol(objfile, kind, name, domain),
        fallback: null,
        renderResult: renderCompunitSymtab
    });
}

export function findCompunitSymtabByAddress(objfile: Objfile, address: bigint): CompunitSymtab | null {
    return callQuickFunction<CompunitSymtab | null>({
        objfile,
        name: "findCompunitSymtabByAddress",
        renderedArgs: [renderTraceValue(address)],
        call: qf => qf.findCompunitSymtabByAddress(objfile, address),
        fallback: null,
        renderResult: renderCompunitSymtab
    });
}

export function expandAllSymtabs(objfile: Objfile): void {
    callQuickFunction({
        objfile,
        name: "expandAllSymtabs",
        renderedArgs: [],
        call: qf => qf.expandAllSymtabs(objfile),
        fallback: undefined
    });
}

export function expandSymtabsForFunction(objfile: Objfile, funcName: string): void {
    callQuickFunction({
        objfile,
        name: "expandSymtabsForFunction",
        renderedArgs: [renderTraceValue(funcName)],
        call: qf => qf.expandSymtabsForFunction(objfile, funcName),
        fallback: undefined
    });
}

export function expandSymtabsWithFullname(objfile: Objfile, fullname: string): void {
    callQuickFunction({
        objfile,
        name: "expandSymtabsWithFullname",
        renderedArgs: [renderTraceValue(fullname)],
        call: qf => qf.expandSymtabsWithFullname(objfile, fullname),
        fallback: undefined
    });
}

export function printStats(objfile: Objfile, printBcache: boolean): void {
    callQuickFunction({
        objfile,
        name: "printStats",
        renderedArgs: [renderTraceValue(printBcache)],
        call: qf => qf.printStats(objfile, printBcache),
        fallback: undefined
    });
}

export function dumpObjfile(objfile: Objfile): void {
    callQuickFunction({
        objfile,
        name: "dump",
        renderedArgs: [],
        call: qf => qf.dump(objfile),
        fallback: undefined
    });
}

export function mapSymtabsMatchingFilename(
    objfile: Objfile,
    params: { name: string; realPath: string | null; callback: (symtab: Symtab) => boolean }
): boolean {
    const { name, realPath, callback } = params;

    return callQuickFunction<boolean>({
        objfile,
        name: "mapSymtabsMatchingFilename",
        renderedArgs: [renderTraceValue(name), renderTraceValue(realPath), renderTraceValue(callback)],
        call: qf => qf.mapSymtabsMatchingFilename(objfile, name, realPath, callback),
        fallback: false,
        renderResult: renderTraceValue
    });
}

/** NOTE: The lookup name is not part of the trace record. */
export function mapMatchingSymbols(
    objfile: Objfile,
    params: {
        name: string;
        domain: Domain;
        isGlobal: boolean;
        callback: (symbol: BlockSymbol) => boolean;
        orderedCompare?: (a: string, b: string) => number;
    }
): void {
    const { name, domain, isGlobal, callback, orderedCompare = null } = params;

    callQuickFunction({
        objfile,
        name: "mapMatchingSymbols",
        renderedArgs: [domain, renderTraceValue(isGlobal), renderTraceValue(orderedCompare)],
        call: qf => qf.mapMatchingSymbols(objfile, name, domain, isGlobal, callback, orderedCompare),
        fallback: undefined
    });
}

export function expandSymtabsMatching(
    objfile: Objfile,
    params: {
        fileMatcher?: (filename: string, isBasename: boolean) => boolean;
        lookupName?: string;
        symbolMatcher?: (symbolName: string) => boolean;
        expansionNotify?: (cust: CompunitSymtab) => void;
        searchDomain: SearchDomain;
    }
): void {
    const {
        fileMatcher = null,
        lookupName = null,
        symbolMatcher = null,
        expansionNotify = null,
        searchDomain
    } = params;

    callQuickFunction({
        objfile,
        name: "expandSymtabsMatching",
        renderedArgs: [
            renderTraceValue(fileMatcher),
            renderTraceValue(symbolMatcher),
            renderTraceValue(expansionNotify),
            searchDomain
        ],
        call: qf =>
            qf.expandSymtabsMatching(
                objfile,
                fileMatcher,
                lookupName,
                symbolMatcher,
                expansionNotify,
                searchDomain
            ),
        fallback: undefined
    });
}

/** Finds the compunit symtab that covers `pc`. */
export function findPcSectCompunitSymtab(
    objfile: Objfile,
    params: {
        msymbol: MinimalSymbol | null;
        pc: bigint;
        section: Section | null;
        warnIfReadin: boolean;
    }
): CompunitSymtab | null {
    const { msymbol, pc, section, warnIfReadin } = params;

    return callQuickFunction<CompunitSymtab | null>({
        objfile,
        name: "findPcSectCompunitSymtab",
        renderedArgs: [
            renderTraceValue(msymbol),
            renderTraceValue(pc),
            renderTraceValue(section),
            renderTraceValue(warnIfReadin)
        ],
        call: qf => qf.findPcSectCompunitSymtab(objfile, msymbol, pc, section, warnIfReadin),
        fallback: null,
        renderResult: renderCompunitSymtab
    });
}

export function mapSymbolFilenames(
    objfile: Objfile,
    params: { fun: (filename: string, fullname: string | null) => void; needFullname: boolean }
): void {
    const { fun, needFullname } = params;

    callQuickFunction({
        objfile,
        name: "mapSymbolFilenames",
        renderedArgs: [renderTraceValue(fun), renderTraceValue(needFullname)],
        call: qf => qf.mapSymbolFilenames(objfile, fun, needFullname),
        fallback: undefined
    });
}

/** Not traced. */
export function lookupGlobalSymbolLanguage(
    objfile: Objfile,
    params: { name: string; domain: Domain }
): { language: Language; isSymbolFound: boolean } {
    const { name, domain } = params;

    if (objfile.qf === undefined) {
        return { language: "unknown", isSymbolFound: false };
    }

    return objfile.qf.lookupGlobalSymbolLanguage(objfile, name, domain);
}
