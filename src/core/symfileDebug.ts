import { assert, id } from "tsafe";
import { createSideTable } from "../tools/createSideTable";
import { assignObjfileSymFns, evtObjfileDestroyed, type Objfile } from "./objfile";
import { getProgramSpaces } from "./programSpace";
import { createSymFnsShadow } from "./shadowTable";
import type { SymFns } from "./SymFns";

export type SymfileDebugData = {
    /** The table that was active before the install. Borrowed, valid until the uninstall. */
    real: SymFns;
    shadow: SymFns;
};

const globalContext = {
    /** If true all calls to the symbol functions are logged. */
    debugSymfile: id<boolean>(false),
    symfileDebugDataByObjfile: createSideTable<Objfile, SymfileDebugData>()
};

export function getIsSymfileDebugInstalled(objfile: Objfile): boolean {
    return objfile.sf !== undefined && globalContext.symfileDebugDataByObjfile.has(objfile);
}

export function getSymfileDebugData(objfile: Objfile): SymfileDebugData | undefined {
    return globalContext.symfileDebugDataByObjfile.lookup(objfile);
}

/**
 * Swaps in a table that logs every call and forwards it to the objfile's current table.
 * Must not be called if the logging is already installed.
 */
export function installSymfileDebugLogging(objfile: Objfile): void {
    assert(
        !getIsSymfileDebugInstalled(objfile),
        () => `Symfile debug logging is already installed for ${objfile.debugName}`
    );

    const real = objfile.sf;

    assert(real !== undefined, () => `${objfile.debugName} has no symbol functions yet`);

    const shadow = createSymFnsShadow({
        real,
        host: objfile,
        hostDebugName: objfile.debugName
    });

    globalContext.symfileDebugDataByObjfile.associate(objfile, { real, shadow });

    assignObjfileSymFns(objfile, shadow);
}

/**
 * Restores the table that was active when the logging was installed.
 * Must not be called if the logging is not installed.
 */
export function uninstallSymfileDebugLogging(objfile: Objfile): void {
    assert(
        getIsSymfileDebugInstalled(objfile),
        () => `Symfile debug logging is not installed for ${objfile.debugName}`
    );

    const debugData = globalContext.symfileDebugDataByObjfile.lookup(objfile);

    assert(debugData !== undefined);

    assignObjfileSymFns(objfile, debugData.real);

    globalContext.symfileDebugDataByObjfile.clear(objfile);
}

/**
 * Call this function to set `objfile.sf`.
 * Do not set it any other way.
 */
export function setObjfileSymFns(objfile: Objfile, sf: SymFns): void {
    if (getIsSymfileDebugInstalled(objfile)) {
        assert(
            globalContext.debugSymfile,
            () => `Symfile debug logging is installed for ${objfile.debugName} while disabled`
        );

        // Remove the current one, a new one is installed below.
        uninstallSymfileDebugLogging(objfile);
    }

    assignObjfileSymFns(objfile, sf);

    if (globalContext.debugSymfile) {
        installSymfileDebugLogging(objfile);
    }
}

export function getDebugSymfile(): boolean {
    return globalContext.debugSymfile;
}

/** Installs or uninstalls the logging on every live objfile so that it matches `value`. */
export function setDebugSymfile(value: boolean): void {
    globalContext.debugSymfile = value;

    for (const programSpace of getProgramSpaces()) {
        for (const objfile of programSpace.objfiles) {
            if (objfile.sf === undefined) {
                // Gets installed by its first setObjfileSymFns()
                continue;
            }

            const isInstalled = getIsSymfileDebugInstalled(objfile);

            if (value && !isInstalled) {
                installSymfileDebugLogging(objfile);
                continue;
            }

            if (!value && isInstalled) {
                uninstallSymfileDebugLogging(objfile);
            }
        }
    }
}

export function showDebugSymfile(): string {
    return `Symfile debugging is ${globalContext.debugSymfile ? "on" : "off"}.`;
}

evtObjfileDestroyed.subscribe(objfile => {
    if (!getIsSymfileDebugInstalled(objfile)) {
        return;
    }

    uninstallSymfileDebugLogging(objfile);
});
