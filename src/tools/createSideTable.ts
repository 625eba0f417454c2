/**
 * Keyed store that attaches data to objects it does not own.
 * An entry never keeps its key alive.
 */
export type SideTable<Key extends object, Data> = {
    /** Installs or replaces the entry of `key`. */
    associate: (key: Key, data: Data) => void;
    lookup: (key: Key) => Data | undefined;
    clear: (key: Key) => void;
    has: (key: Key) => boolean;
};

export function createSideTable<Key extends object, Data>(): SideTable<Key, Data> {
    const dataByKey = new WeakMap<Key, Data>();

    return {
        associate: (key, data) => {
            dataByKey.set(key, data);
        },
        lookup: key => dataByKey.get(key),
        clear: key => {
            dataByKey.delete(key);
        },
        has: key => dataByKey.has(key)
    };
}
