import { basename as pathBasename } from "path";
import { assert } from "tsafe";
import { createEvt, type NonPostableEvt } from "../tools/Evt";
import type { SymFns } from "./SymFns";
import type { QuickSymbolFunctions } from "./quickFunctions";

export type Objfile = {
    readonly name: string;
    /** What trace records print to identify the objfile. */
    readonly debugName: string;
    /**
     * The active symbol functions. `undefined` only until the objfile's
     * first `setObjfileSymFns()`.
     * Never assign it directly, go through `setObjfileSymFns()`.
     */
    readonly sf: SymFns | undefined;
    readonly qf: QuickSymbolFunctions | undefined;
    readonly flags: {
        arePartialSymbolsRead: boolean;
    };
};

const globalContext = {
    setSfByObjfile: new WeakMap<Objfile, (sf: SymFns) => void>(),
    evtObjfileDestroyed: createEvt<Objfile>()
};

export const evtObjfileDestroyed: NonPostableEvt<Objfile> = globalContext.evtObjfileDestroyed;

export function createObjfile(params: { name: string; qf: QuickSymbolFunctions | undefined }): Objfile {
    const { name, qf } = params;

    let sf: SymFns | undefined = undefined;

    const objfile: Objfile = {
        name,
        debugName: pathBasename(name),
        get sf() {
            return sf;
        },
        qf,
        flags: {
            arePartialSymbolsRead: false
        }
    };

    globalContext.setSfByObjfile.set(objfile, sf_new => {
        sf = sf_new;
    });

    return objfile;
}

/** NOTE: Raw assignment, only `setObjfileSymFns()` and the debug installer may call this. */
export function assignObjfileSymFns(objfile: Objfile, sf: SymFns): void {
    const setSf = globalContext.setSfByObjfile.get(objfile);

    assert(setSf !== undefined, () => `${objfile.debugName} was not created by createObjfile()`);

    setSf(sf);
}

export function destroyObjfile(objfile: Objfile): void {
    globalContext.evtObjfileDestroyed.post(objfile);

    globalContext.setSfByObjfile.delete(objfile);
}
