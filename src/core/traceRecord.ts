import { hexString } from "../tools/hexString";
import { hostAddressToString } from "../tools/hostAddress";

/** How a `null` ("not found") or absent value is printed. */
export const NULL_PLACEHOLDER = "NULL";

export function renderTraceValue(value: unknown): string {
    if (value === undefined || value === null) {
        return NULL_PLACEHOLDER;
    }

    if (typeof value === "string") {
        return `"${value}"`;
    }

    if (typeof value === "boolean") {
        return value ? "true" : "false";
    }

    if (typeof value === "bigint") {
        return hexString(value);
    }

    if (typeof value === "number") {
        return Number.isInteger(value) ? hexString(value) : `${value}`;
    }

    if (typeof value === "symbol") {
        return value.toString();
    }

    if (typeof value === "function" || typeof value === "object") {
        return hostAddressToString(value);
    }

    return `${value}`;
}

/** `sf->read (libfoo.so, 0x2)` */
export function formatTraceCall(params: {
    tableLabel: string;
    name: string;
    debugName: string;
    renderedArgs: string[];
}): string {
    const { tableLabel, name, debugName, renderedArgs } = params;

    return `${tableLabel}->${name} (${[debugName, ...renderedArgs].join(", ")})`;
}

/** `sf->relocate (...) = 0x1010` */
export function formatTraceResult(params: {
    tableLabel: string;
    name: string;
    renderedResult: string;
}): string {
    const { tableLabel, name, renderedResult } = params;

    return `${tableLabel}->${name} (...) = ${renderedResult}`;
}
