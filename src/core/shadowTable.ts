import { getStdlog } from "./stdlog";
import type { SymFnName, SymFns, SymProbeFns } from "./SymFns";
import { formatTraceCall, formatTraceResult, renderTraceValue } from "./traceRecord";

function createForwardingWrapper<Args extends unknown[], R>(params: {
    tableLabel: string;
    name: string;
    fn: (...args: Args) => R;
    /** What `this` is bound to when `fn` is called. */
    self: object;
    host: object;
    hostDebugName: string;
}): (...args: Args) => R {
    const { tableLabel, name, fn, self, host, hostDebugName } = params;

    return (...args) => {
        // NOTE: The record is written before the call so that it is there
        // even if the call throws.
        getStdlog().write(
            formatTraceCall({
                tableLabel,
                name,
                debugName: hostDebugName,
                renderedArgs: args.filter(arg => arg !== host).map(renderTraceValue)
            })
        );

        const result = fn.apply(self, args);

        if (result !== undefined) {
            getStdlog().write(
                formatTraceResult({
                    tableLabel,
                    name,
                    renderedResult: renderTraceValue(result)
                })
            );
        }

        return result;
    };
}

function createProbeFnsShadow(params: {
    real: SymProbeFns;
    host: object;
    hostDebugName: string;
}): SymProbeFns {
    const { real, host, hostDebugName } = params;

    return Object.freeze({
        getProbes: createForwardingWrapper({
            tableLabel: "probes",
            name: "getProbes",
            fn: real.getProbes,
            self: real,
            host,
            hostDebugName
        })
    });
}

/**
 * Creates a frozen table with a slot wherever `real` has one, including
 * the methods it inherits. Every function of the returned table logs the
 * call to the diagnostic stream and forwards it to `real`.
 *
 * `real` is neither copied nor mutated.
 */
export function createSymFnsShadow(params: { real: SymFns; host: object; hostDebugName: string }): SymFns {
    const { real, host, hostDebugName } = params;

    const { newInit, init, read, finish, offsets, segments, readLinetable, relocate, probeFns } = real;

    const wrap = <Args extends unknown[], R>(name: SymFnName, fn: (...args: Args) => R) =>
        createForwardingWrapper({ tableLabel: "sf", name, fn, self: real, host, hostDebugName });

    return Object.freeze({
        ...(newInit === undefined ? {} : { newInit: wrap("newInit", newInit) }),
        ...(init === undefined ? {} : { init: wrap("init", init) }),
        ...(read === undefined ? {} : { read: wrap("read", read) }),
        ...(finish === undefined ? {} : { finish: wrap("finish", finish) }),
        ...(offsets === undefined ? {} : { offsets: wrap("offsets", offsets) }),
        ...(segments === undefined ? {} : { segments: wrap("segments", segments) }),
        ...(readLinetable === undefined ? {} : { readLinetable: wrap("readLinetable", readLinetable) }),
        ...(relocate === undefined ? {} : { relocate: wrap("relocate", relocate) }),
        ...(probeFns === undefined
            ? {}
            : { probeFns: createProbeFnsShadow({ real: probeFns, host, hostDebugName }) })
    });
}
