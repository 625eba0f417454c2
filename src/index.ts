export type {
    SymFns,
    SymFnName,
    SymProbeFns,
    Bfd,
    Section,
    SectionAddrInfo,
    SymfileSegmentData,
    Probe
} from "./core/SymFns";
export {
    symFnNames,
    getPresentSymFnNames,
    SYMFILE_VERBOSE,
    SYMFILE_MAINLINE,
    SYMFILE_DEFER_BP_RESET,
    SYMFILE_NO_READ
} from "./core/SymFns";
export { evtObjfileDestroyed, type Objfile } from "./core/objfile";
export { createProgramSpace, getProgramSpaces, type ProgramSpace } from "./core/programSpace";
export {
    installSymfileDebugLogging,
    uninstallSymfileDebugLogging,
    getIsSymfileDebugInstalled,
    getSymfileDebugData,
    setObjfileSymFns,
    getDebugSymfile,
    setDebugSymfile,
    showDebugSymfile,
    type SymfileDebugData
} from "./core/symfileDebug";
export {
    hasPartialSymbols,
    findLastSourceSymtab,
    forgetCachedSourceInfo,
    lookupSymbol,
    findCompunitSymtabByAddress,
    expandAllSymtabs,
    expandSymtabsForFunction,
    expandSymtabsWithFullname,
    printStats,
    dumpObjfile,
    mapSymtabsMatchingFilename,
    mapMatchingSymbols,
    expandSymtabsMatching,
    findPcSectCompunitSymtab,
    mapSymbolFilenames,
    lookupGlobalSymbolLanguage,
    type QuickSymbolFunctions,
    type SearchDomain,
    type Language,
    type BlockSymbol,
    type MinimalSymbol,
    type Symtab,
    type CompunitSymtab,
    type BlockKind,
    type Domain
} from "./core/quickFunctions";
export { addSymbolFile, finishSymbolFile, getObjfileProbes, relocateSection } from "./core/symfile";
export {
    tryParseBooleanSetting,
    parseBooleanSetting,
    setDebugSymfileCommand,
    showDebugSymfileCommand,
    loadSymfileTraceConfig,
    applySymfileTraceConfig,
    SYMFILE_TRACE_DEBUG_ENV_VAR,
    type SymfileTraceConfig
} from "./core/settings";
export { getStdlog, setStdlog, type DiagnosticStream } from "./core/stdlog";
export { renderTraceValue, NULL_PLACEHOLDER } from "./core/traceRecord";
export { createSideTable, type SideTable } from "./tools/createSideTable";
export { hostAddressToString } from "./tools/hostAddress";
export { UnsupportedSymFnError } from "./core/UnsupportedSymFnError";
export { InvalidSettingValueError } from "./core/InvalidSettingValueError";
