import { describe, it, expect, vi } from "vitest";
import { AssertionError } from "tsafe/assert";
import { createProgramSpace } from "../src/core/programSpace";
import {
    getDebugSymfile,
    getIsSymfileDebugInstalled,
    getSymfileDebugData,
    installSymfileDebugLogging,
    setDebugSymfile,
    setObjfileSymFns,
    showDebugSymfile,
    uninstallSymfileDebugLogging
} from "../src/core/symfileDebug";
import { getPresentSymFnNames, symFnNames, type Probe, type Section, type SymFns } from "../src/core/SymFns";
import type { Objfile } from "../src/core/objfile";
import { hostAddressToString } from "../src/tools/hostAddress";
import { getSf, useCapturedStdlog, useCleanSymfileState } from "./utils";

const records = useCapturedStdlog();
useCleanSymfileState();

function createLibfoo(sf: SymFns): Objfile {
    const programSpace = createProgramSpace();

    const objfile = programSpace.addObjfile({ name: "/usr/lib/libfoo.so" });

    setObjfileSymFns(objfile, sf);

    return objfile;
}

describe("toggling symfile debugging", () => {
    it("installs a logging table that mirrors the real one and removes it when turned off", () => {
        const read = vi.fn((_objfile: Objfile, _symfileFlags: number) => 7);
        const finish = vi.fn();
        const real: SymFns = { read, finish };

        const objfile = createLibfoo(real);

        expect(objfile.sf).toBe(real);
        expect(getIsSymfileDebugInstalled(objfile)).toBe(false);

        setDebugSymfile(true);

        const debugData = getSymfileDebugData(objfile);

        expect(getIsSymfileDebugInstalled(objfile)).toBe(true);
        expect(debugData?.real).toBe(real);
        expect(objfile.sf).toBe(debugData?.shadow);
        expect(objfile.sf).not.toBe(real);

        const shadow = getSf(objfile);

        expect(getPresentSymFnNames(shadow)).toEqual(["read", "finish"]);
        expect("init" in shadow).toBe(false);
        expect(shadow.init).toBeUndefined();
        expect(records).toEqual([]);

        const result: unknown = shadow.read?.(objfile, 0x3);

        expect(result).toBe(7);
        expect(read).toHaveBeenCalledTimes(1);
        expect(read).toHaveBeenCalledWith(objfile, 0x3);
        expect(records).toEqual(["sf->read (libfoo.so, 0x3)", "sf->read (...) = 0x7"]);

        setDebugSymfile(false);

        expect(objfile.sf).toBe(real);
        expect(getSymfileDebugData(objfile)).toBeUndefined();
        expect(getIsSymfileDebugInstalled(objfile)).toBe(false);
    });

    it("writes no record while reconciling", () => {
        createLibfoo({ init: vi.fn() });

        setDebugSymfile(true);
        setDebugSymfile(true);
        setDebugSymfile(false);

        expect(records).toEqual([]);
    });

    it("is a no-op when set again to the same value", () => {
        const objfile = createLibfoo({ init: vi.fn() });

        setDebugSymfile(true);

        const shadow = objfile.sf;

        setDebugSymfile(true);

        expect(objfile.sf).toBe(shadow);
        expect(getDebugSymfile()).toBe(true);
    });

    it("restores every live objfile of every program space", () => {
        const tables: SymFns[] = [{ init: vi.fn() }, { read: vi.fn() }, {}];

        const objfiles = [createProgramSpace(), createProgramSpace()].flatMap((programSpace, i) =>
            tables.slice(i, i + 2).map((sf, j) => {
                const objfile = programSpace.addObjfile({ name: `/lib/lib${i}${j}.so` });
                setObjfileSymFns(objfile, sf);
                return objfile;
            })
        );

        const sfs_before = objfiles.map(objfile => objfile.sf);

        setDebugSymfile(true);

        for (const objfile of objfiles) {
            expect(getIsSymfileDebugInstalled(objfile)).toBe(true);
        }

        setDebugSymfile(false);

        expect(objfiles.map(objfile => objfile.sf)).toEqual(sfs_before);
        objfiles.forEach((objfile, i) => expect(objfile.sf).toBe(sfs_before[i]));
    });

    it("skips objfiles whose symbol functions are not set yet", () => {
        const programSpace = createProgramSpace();

        const objfile = programSpace.addObjfile({ name: "/lib/libpending.so" });

        setDebugSymfile(true);

        expect(objfile.sf).toBeUndefined();
        expect(getIsSymfileDebugInstalled(objfile)).toBe(false);

        const real: SymFns = { init: vi.fn() };

        setObjfileSymFns(objfile, real);

        expect(getSymfileDebugData(objfile)?.real).toBe(real);
    });

    it("renders the state of the setting", () => {
        expect(showDebugSymfile()).toBe("Symfile debugging is off.");

        setDebugSymfile(true);

        expect(showDebugSymfile()).toBe("Symfile debugging is on.");
    });
});

describe("the logging table", () => {
    it("preserves which slots are present", () => {
        const probeFns = { getProbes: () => [] };

        const tables: SymFns[] = [
            {},
            { newInit: vi.fn(), relocate: vi.fn() },
            { init: undefined, segments: vi.fn() },
            {
                newInit: vi.fn(),
                init: vi.fn(),
                read: vi.fn(),
                finish: vi.fn(),
                offsets: vi.fn(),
                segments: vi.fn(),
                readLinetable: vi.fn(),
                relocate: vi.fn(),
                probeFns
            }
        ];

        for (const real of tables) {
            const objfile = createLibfoo(real);

            installSymfileDebugLogging(objfile);

            const shadow = getSf(objfile);

            for (const name of [...symFnNames, "probeFns"] as const) {
                expect(name in shadow).toBe(real[name] !== undefined);
                expect(shadow[name] === undefined).toBe(real[name] === undefined);
            }

            expect(getPresentSymFnNames(shadow)).toEqual(getPresentSymFnNames(real));

            uninstallSymfileDebugLogging(objfile);
        }
    });

    it("returns what the real function returns and logs it", () => {
        const relocated = new Uint8Array([1, 2, 3]);
        const relocate = vi.fn(() => relocated);

        const objfile = createLibfoo({ relocate });

        setDebugSymfile(true);

        const section: Section = { name: ".text", vma: 0x1000n, size: 16 };
        const buf = new Uint8Array(16);

        const result = getSf(objfile).relocate?.(objfile, section, buf);

        expect(result).toBe(relocated);
        expect(relocate).toHaveBeenCalledWith(objfile, section, buf);
        expect(records).toEqual([
            `sf->relocate (libfoo.so, ${hostAddressToString(section)}, ${hostAddressToString(buf)})`,
            `sf->relocate (...) = ${hostAddressToString(relocated)}`
        ]);
    });

    it("prints a not found result as NULL", () => {
        const objfile = createLibfoo({ segments: () => null });

        setDebugSymfile(true);

        const abfd = { filename: "/usr/lib/libfoo.so" };

        expect(getSf(objfile).segments?.(abfd)).toBeNull();
        expect(records).toEqual([
            `sf->segments (libfoo.so, ${hostAddressToString(abfd)})`,
            "sf->segments (...) = NULL"
        ]);
    });

    it("lets errors of the real function through, after the call record", () => {
        const error = new Error("bad DWARF");

        const objfile = createLibfoo({
            read: () => {
                throw error;
            }
        });

        setDebugSymfile(true);

        let caught: unknown = undefined;

        try {
            getSf(objfile).read?.(objfile, 0);
        } catch (error_caught) {
            caught = error_caught;
        }

        expect(caught).toBe(error);
        expect(records).toEqual(["sf->read (libfoo.so, 0x0)"]);
    });

    it("logs the calls of the probe functions", () => {
        const probes: Probe[] = [{ provider: "libc", name: "setjmp", address: 0x4010n }];
        const probeFns = { getProbes: vi.fn(() => probes) };

        const objfile = createLibfoo({ probeFns });

        setDebugSymfile(true);

        const shadowProbeFns = getSf(objfile).probeFns;

        expect(shadowProbeFns).not.toBe(probeFns);
        expect(shadowProbeFns?.getProbes(objfile)).toBe(probes);
        expect(records).toEqual([
            "probes->getProbes (libfoo.so)",
            `probes->getProbes (...) = ${hostAddressToString(probes)}`
        ]);
    });

    it("writes a single record for functions that return nothing", () => {
        const objfile = createLibfoo({ newInit: vi.fn(), offsets: vi.fn() });

        setDebugSymfile(true);

        const info = [{ addr: 0x400000n, name: ".text", sectindex: 1 }];

        getSf(objfile).newInit?.(objfile);
        getSf(objfile).offsets?.(objfile, info);

        expect(records).toEqual([
            "sf->newInit (libfoo.so)",
            `sf->offsets (libfoo.so, ${hostAddressToString(info)})`
        ]);
    });

    it("logs the methods of a reader written as a class", () => {
        class ElfReader implements SymFns {
            public readonly readFlags: number[] = [];

            read(_objfile: Objfile, symfileFlags: number) {
                this.readFlags.push(symfileFlags);
            }

            finish() {}
        }

        const real = new ElfReader();

        const objfile = createLibfoo(real);

        setDebugSymfile(true);

        const shadow = getSf(objfile);

        expect("read" in shadow).toBe(true);
        expect(getPresentSymFnNames(shadow)).toEqual(["read", "finish"]);

        shadow.read?.(objfile, 0x2);

        expect(real.readFlags).toEqual([0x2]);
        expect(records).toEqual(["sf->read (libfoo.so, 0x2)"]);
    });

    it("exposes the logging functions as its own properties", () => {
        const read = vi.fn();

        const objfile = createLibfoo({ read });

        setDebugSymfile(true);

        const shadow = getSf(objfile);

        const descriptor = Object.getOwnPropertyDescriptor(shadow, "read");

        expect(descriptor?.value).toBe(shadow.read);
        expect(descriptor?.value).not.toBe(read);
        expect(Object.isFrozen(shadow)).toBe(true);
    });

    it("cannot be modified", () => {
        const objfile = createLibfoo({ init: vi.fn() });

        setDebugSymfile(true);

        const shadow = getSf(objfile);

        expect(() => {
            shadow.init = undefined;
        }).toThrow(TypeError);
    });
});

describe("install and uninstall", () => {
    it("round trips to the exact same table", () => {
        const real: SymFns = { read: vi.fn() };

        const objfile = createLibfoo(real);

        installSymfileDebugLogging(objfile);
        uninstallSymfileDebugLogging(objfile);

        expect(objfile.sf).toBe(real);
        expect(getSymfileDebugData(objfile)).toBeUndefined();
    });

    it("refuses to install twice", () => {
        const objfile = createLibfoo({ read: vi.fn() });

        installSymfileDebugLogging(objfile);

        expect(() => installSymfileDebugLogging(objfile)).toThrow(AssertionError);
    });

    it("refuses to uninstall what is not installed", () => {
        const objfile = createLibfoo({ read: vi.fn() });

        expect(() => uninstallSymfileDebugLogging(objfile)).toThrow(AssertionError);
    });
});

describe("setObjfileSymFns", () => {
    it("moves the logging over to the new table", () => {
        setDebugSymfile(true);

        const real_first: SymFns = { read: vi.fn() };
        const real_second: SymFns = { init: vi.fn() };

        const objfile = createLibfoo(real_first);

        const shadow_first = objfile.sf;

        expect(getSymfileDebugData(objfile)?.real).toBe(real_first);

        setObjfileSymFns(objfile, real_second);

        expect(getSymfileDebugData(objfile)?.real).toBe(real_second);
        expect(objfile.sf).not.toBe(shadow_first);
        expect(getPresentSymFnNames(getSf(objfile))).toEqual(["init"]);

        setDebugSymfile(false);

        expect(objfile.sf).toBe(real_second);
    });

    it("asserts that installed logging implies symfile debugging is on", () => {
        const objfile = createLibfoo({ read: vi.fn() });

        installSymfileDebugLogging(objfile);

        expect(() => setObjfileSymFns(objfile, {})).toThrow(AssertionError);
    });
});

describe("objfile destruction", () => {
    it("releases the logging of the objfile", () => {
        const programSpace = createProgramSpace();

        const objfile = programSpace.addObjfile({ name: "/usr/lib/libgone.so" });

        const real: SymFns = { read: vi.fn() };

        setObjfileSymFns(objfile, real);

        setDebugSymfile(true);

        expect(getIsSymfileDebugInstalled(objfile)).toBe(true);

        programSpace.removeObjfile(objfile);

        expect(getSymfileDebugData(objfile)).toBeUndefined();
        expect(objfile.sf).toBe(real);
        expect(programSpace.objfiles).toEqual([]);
    });
});
