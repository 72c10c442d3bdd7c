export type WireValue = string | number | boolean | ReadonlyArray<number>;

/**
 * One entry of an entity's wire form. Fields without a `defaultValue` are always
 * emitted; the others only when they differ from it, or when `debug` is set.
 */
export interface WireField {
    readonly key: string;
    readonly value: WireValue;
    readonly defaultValue?: WireValue;
}

export const isDefault = ({ value, defaultValue }: WireField): boolean => {
    if (defaultValue === undefined) {
        return false;
    }
    if (typeof value === 'object' && typeof defaultValue === 'object') {
        return value.length === defaultValue.length && value.every((item, i) => item === defaultValue[i]);
    }
    return value === defaultValue;
};

export const compactFields = (fields: ReadonlyArray<WireField>, debug: boolean): Record<string, WireValue> =>
    Object.fromEntries(fields.filter(field => debug || !isDefault(field)).map(({ key, value }) => [key, value]));
