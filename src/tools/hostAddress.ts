import { hexString } from "./hexString";

const ADDRESS_STRIDE = 0x10;

const globalContext = {
    addressByRef: new WeakMap<object, number>(),
    nextAddress: 0x1000
};

/**
 * Address-like token for an object reference.
 * The same reference always gets the same token for the lifetime of the process.
 */
export function hostAddressToString(ref: object): string {
    const { addressByRef } = globalContext;

    let address = addressByRef.get(ref);

    if (address === undefined) {
        address = globalContext.nextAddress;
        globalContext.nextAddress += ADDRESS_STRIDE;
        addressByRef.set(ref, address);
    }

    return hexString(address);
}
