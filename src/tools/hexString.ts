export function hexString(value: number | bigint): string {
    if (typeof value === "bigint") {
        return value < 0n ? `-0x${(-value).toString(16)}` : `0x${value.toString(16)}`;
    }

    return value < 0 ? `-0x${(-value).toString(16)}` : `0x${value.toString(16)}`;
}
