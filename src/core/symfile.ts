import { assert } from "tsafe";
import type { Objfile } from "./objfile";
import type { ProgramSpace } from "./programSpace";
import type { QuickSymbolFunctions } from "./quickFunctions";
import { setObjfileSymFns } from "./symfileDebug";
import { SYMFILE_NO_READ, type Probe, type Section, type SymFns } from "./SymFns";
import { UnsupportedSymFnError } from "./UnsupportedSymFnError";

function getActiveSymFns(objfile: Objfile): SymFns {
    const { sf } = objfile;

    assert(sf !== undefined, () => `${objfile.debugName} has no symbol functions`);

    return sf;
}

/**
 * Creates the objfile of a symbol file and reads its symbols with `sf`.
 * Every call goes through the objfile's active table, so they are logged
 * when symfile debugging is on.
 */
export function addSymbolFile(params: {
    programSpace: ProgramSpace;
    name: string;
    sf: SymFns;
    qf?: QuickSymbolFunctions;
    addFlags?: number;
}): Objfile {
    const { programSpace, name, sf, qf, addFlags = 0 } = params;

    const objfile = programSpace.addObjfile({ name, qf });

    setObjfileSymFns(objfile, sf);

    getActiveSymFns(objfile).newInit?.(objfile);
    getActiveSymFns(objfile).init?.(objfile);

    read: {
        if ((addFlags & SYMFILE_NO_READ) !== 0) {
            break read;
        }

        getActiveSymFns(objfile).read?.(objfile, addFlags);

        objfile.flags.arePartialSymbolsRead = true;

        getActiveSymFns(objfile).readLinetable?.(objfile);
    }

    return objfile;
}

/** Lets the reader release what it holds for the objfile, then destroys it. */
export function finishSymbolFile(params: { programSpace: ProgramSpace; objfile: Objfile }): void {
    const { programSpace, objfile } = params;

    getActiveSymFns(objfile).finish?.(objfile);

    programSpace.removeObjfile(objfile);
}

export function getObjfileProbes(objfile: Objfile): readonly Probe[] {
    const { probeFns } = getActiveSymFns(objfile);

    if (probeFns === undefined) {
        return [];
    }

    return probeFns.getProbes(objfile);
}

export function relocateSection(params: {
    objfile: Objfile;
    section: Section;
    buf: Uint8Array;
}): Uint8Array | null {
    const { objfile, section, buf } = params;

    const { relocate } = getActiveSymFns(objfile);

    if (relocate === undefined) {
        throw new UnsupportedSymFnError({
            symFnName: "relocate",
            objfileDebugName: objfile.debugName
        });
    }

    return relocate(objfile, section, buf);
}
