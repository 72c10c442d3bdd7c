import z from 'zod';

import { EnumValue, ValidationError } from '../errors';

const integerSchema = z.number().int();
const numberSchema = z.number().finite();
const stringSchema = z.string();
const booleanSchema = z.boolean();
const integerListSchema = z.array(z.number().int());
const numberPairSchema = z.tuple([numberSchema, numberSchema]);

export const asInteger = (field: string, value: unknown): number => {
    const parsed = integerSchema.safeParse(value);
    if (!parsed.success) {
        throw new ValidationError(field, { constraint: 'type', expected: 'must be an integer' });
    }
    return parsed.data;
};

export const asNumber = (field: string, value: unknown): number => {
    const parsed = numberSchema.safeParse(value);
    if (!parsed.success) {
        throw new ValidationError(field, { constraint: 'type', expected: 'must be a number' });
    }
    return parsed.data;
};

export const asString = (field: string, value: unknown): string => {
    const parsed = stringSchema.safeParse(value);
    if (!parsed.success) {
        throw new ValidationError(field, { constraint: 'type', expected: 'must be a string' });
    }
    return parsed.data;
};

export const asBoolean = (field: string, value: unknown): boolean => {
    const parsed = booleanSchema.safeParse(value);
    if (!parsed.success) {
        throw new ValidationError(field, { constraint: 'type', expected: 'must be a boolean' });
    }
    return parsed.data;
};

export const asNonNegativeInteger = (field: string, value: unknown): number => {
    const parsed = asInteger(field, value);
    if (parsed < 0) {
        throw new ValidationError(field, { constraint: 'range', expected: 'must be greater than or equal to 0' });
    }
    return parsed;
};

export const asNonNegativeNumber = (field: string, value: unknown): number => {
    const parsed = asNumber(field, value);
    if (parsed < 0) {
        throw new ValidationError(field, { constraint: 'range', expected: 'must be greater than or equal to 0' });
    }
    return parsed;
};

/** Integer within [min, max] */
export const asBoundedInteger = (field: string, value: unknown, min: number, max: number): number => {
    const parsed = asInteger(field, value);
    if (parsed < min) {
        throw new ValidationError(field, {
            constraint: 'range',
            expected: `must be greater than or equal to ${min}`,
        });
    }
    if (parsed > max) {
        throw new ValidationError(field, { constraint: 'range', expected: `must be less than or equal to ${max}` });
    }
    return parsed;
};

export const asIntegerList = (field: string, value: unknown): number[] => {
    const parsed = integerListSchema.safeParse(value);
    if (!parsed.success) {
        throw new ValidationError(field, { constraint: 'type', expected: 'must be a list of integers' });
    }
    return parsed.data;
};

export const asNumberPair = (field: string, value: unknown): [number, number] => {
    const parsed = numberPairSchema.safeParse(value);
    if (!parsed.success) {
        throw new ValidationError(field, { constraint: 'tuple', expected: 'must be a pair of numbers [begin, end]' });
    }
    return parsed.data;
};

export const asMember = <T extends EnumValue>(field: string, value: unknown, allowed: ReadonlyArray<T>): T => {
    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) {
        throw new ValidationError(field, { constraint: 'enum', expected: 'must be one of', allowed });
    }
    return match;
};
