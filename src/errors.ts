export type ValidationConstraint = 'type' | 'range' | 'enum' | 'tuple' | 'key' | 'uniqueness' | 'capacity';

export type EnumValue = string | number;

export interface ValidationErrorDetails {
    readonly constraint: ValidationConstraint;
    readonly expected: string;
    readonly allowed?: ReadonlyArray<EnumValue>;
}

/** Raised at the exact mutation that would leave an entity or registry invalid */
export class ValidationError extends Error {
    readonly field: string;
    readonly constraint: ValidationConstraint;
    readonly expected: string;
    readonly allowed?: ReadonlyArray<EnumValue>;

    constructor(field: string, { constraint, expected, allowed }: ValidationErrorDetails) {
        const legal = allowed ? ` ${JSON.stringify(allowed)}` : '';
        super(`${field}: ${expected}${legal}`);
        this.name = 'ValidationError';
        this.field = field;
        this.constraint = constraint;
        this.expected = expected;
        this.allowed = allowed;
    }
}

export type ModelErrorCode =
    | 'DUPLICATE_VEHICLE_TYPE'
    | 'UNKNOWN_VEHICLE_TYPE'
    | 'DUPLICATE_POINT'
    | 'UNKNOWN_POINT'
    | 'DUPLICATE_LINK'
    | 'UNKNOWN_LINK'
    | 'NO_VEHICLE_TYPES'
    | 'NO_POINTS'
    | 'NO_LINKS'
    | 'UNSUPPORTED_PLATFORM'
    | 'INVALID_CONFIGURATION'
    | 'RELAUNCH_FAILED'
    | 'DEPENDENCY_LOAD_FAILED'
    | 'BACKEND_LOAD_FAILED'
    | 'LIBRARY_NOT_FOUND'
    | 'ENGINE_CALL_FAILED';

const MODEL_ERROR_MESSAGES: Record<ModelErrorCode, string> = {
    DUPLICATE_VEHICLE_TYPE: 'A vehicle type with this id already exists',
    UNKNOWN_VEHICLE_TYPE: 'No vehicle type with this id exists',
    DUPLICATE_POINT: 'A point with this id already exists',
    UNKNOWN_POINT: 'No point with this id exists',
    DUPLICATE_LINK: 'A link with this name already exists',
    UNKNOWN_LINK: 'No link with this name exists',
    NO_VEHICLE_TYPES: 'Model must have at least one vehicle type',
    NO_POINTS: 'Model must have at least one point',
    NO_LINKS: 'Model must have at least one link',
    UNSUPPORTED_PLATFORM: 'The engine is only available on Windows, Linux and macOS',
    INVALID_CONFIGURATION: 'Invalid engine configuration in the environment',
    RELAUNCH_FAILED: 'Failed to relaunch the process with the updated library search path',
    DEPENDENCY_LOAD_FAILED: 'Failed to load an engine dependency library',
    BACKEND_LOAD_FAILED: 'Failed to load the alternate solver backend',
    LIBRARY_NOT_FOUND: 'Engine library could not be found or loaded',
    ENGINE_CALL_FAILED: 'The engine call failed',
};

/** Misuse of the model builder or a failure to reach the engine */
export class ModelError extends Error {
    readonly code: ModelErrorCode;

    constructor(code: ModelErrorCode, options?: { detail?: string; cause?: unknown }) {
        const detail = options?.detail ? `: ${options.detail}` : '';
        super(`${MODEL_ERROR_MESSAGES[code]}${detail}`, { cause: options?.cause });
        this.name = 'ModelError';
        this.code = code;
    }
}
