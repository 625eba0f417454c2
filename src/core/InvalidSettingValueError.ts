export class InvalidSettingValueError extends Error {
    public readonly settingName: string;
    public readonly value: string;

    constructor(params: { settingName: string; value: string }) {
        super(`"on" or "off" expected for ${params.settingName}, got "${params.value}".`);
        this.settingName = params.settingName;
        this.value = params.value;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}
