export class UnsupportedSymFnError extends Error {
    public readonly symFnName: string;

    constructor(params: { symFnName: string; objfileDebugName: string }) {
        super(
            `The symbol reader of ${params.objfileDebugName} does not support "${params.symFnName}"`
        );
        this.symFnName = params.symFnName;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}
