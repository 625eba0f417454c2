import { afterEach, beforeEach } from "vitest";
import { getProgramSpaces } from "../src/core/programSpace";
import { setStdlog, type DiagnosticStream } from "../src/core/stdlog";
import { setDebugSymfile } from "../src/core/symfileDebug";
import type { Objfile } from "../src/core/objfile";
import type { SymFns } from "../src/core/SymFns";

/** Records written to the diagnostic stream during the current test. */
export function useCapturedStdlog(): string[] {
    const records: string[] = [];

    let stdlog_previous: DiagnosticStream | undefined = undefined;

    beforeEach(() => {
        records.length = 0;
        stdlog_previous = setStdlog({ write: record => records.push(record) });
    });

    afterEach(() => {
        if (stdlog_previous !== undefined) {
            setStdlog(stdlog_previous);
        }
    });

    return records;
}

export function useCleanSymfileState(): void {
    afterEach(() => {
        setDebugSymfile(false);

        for (const programSpace of [...getProgramSpaces()]) {
            programSpace.dispose();
        }
    });
}

export function getSf(objfile: Objfile): SymFns {
    const { sf } = objfile;

    if (sf === undefined) {
        throw new Error(`${objfile.debugName} has no symbol functions`);
    }

    return sf;
}
