import { assert, id } from "tsafe";
import { createObjfile, destroyObjfile, type Objfile } from "./objfile";
import type { QuickSymbolFunctions } from "./quickFunctions";

export type ProgramSpace = {
    readonly num: number;
    readonly name: string;
    /** Live objfiles, in creation order. */
    readonly objfiles: readonly Objfile[];
    addObjfile: (params: { name: string; qf?: QuickSymbolFunctions }) => Objfile;
    /** Destroys the objfile, the debug layer releases what it holds for it. */
    removeObjfile: (objfile: Objfile) => void;
    dispose: () => void;
};

const globalContext = {
    programSpaces: id<ProgramSpace[]>([]),
    nextNum: 1
};

export function getProgramSpaces(): readonly ProgramSpace[] {
    return globalContext.programSpaces;
}

export function createProgramSpace(params?: { name?: string }): ProgramSpace {
    const num = globalContext.nextNum++;

    const { name = `program space ${num}` } = params ?? {};

    const objfiles: Objfile[] = [];

    let isDisposed = false;

    const removeObjfile = (objfile: Objfile) => {
        const index = objfiles.indexOf(objfile);

        assert(index !== -1, () => `${objfile.debugName} does not belong to ${name}`);

        objfiles.splice(index, 1);

        destroyObjfile(objfile);
    };

    const programSpace: ProgramSpace = {
        num,
        name,
        objfiles,
        addObjfile: params => {
            assert(!isDisposed, () => `${name} has been disposed`);

            const objfile = createObjfile({ name: params.name, qf: params.qf });

            objfiles.push(objfile);

            return objfile;
        },
        removeObjfile,
        dispose: () => {
            if (isDisposed) {
                return;
            }

            isDisposed = true;

            while (objfiles.length !== 0) {
                removeObjfile(objfiles[objfiles.length - 1]);
            }

            const { programSpaces } = globalContext;

            programSpaces.splice(programSpaces.indexOf(programSpace), 1);
        }
    };

    globalContext.programSpaces.push(programSpace);

    return programSpace;
}
