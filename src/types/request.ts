import z from 'zod';

import { ACTIONS, PRINT_LEVELS, SOLVERS } from '../constants';

export const vehicleTypeJsonSchema = z.object({
    id: z.number().int(),
    startPointId: z.number().int(),
    endPointId: z.number().int(),
    name: z.string().optional(),
    capacity: z.number().int().optional(),
    fixedCost: z.number().optional(),
    varCostDist: z.number().optional(),
    varCostTime: z.number().optional(),
    maxNumber: z.number().int().optional(),
    twBegin: z.number().optional(),
    twEnd: z.number().optional(),
});

export type VehicleTypeJson = z.infer<typeof vehicleTypeJsonSchema>;

export const pointJsonSchema = z.object({
    id: z.number().int(),
    name: z.string().optional(),
    idCustomer: z.number().int().optional(),
    serviceTime: z.number().optional(),
    twBegin: z.number().optional(),
    twEnd: z.number().optional(),
    penaltyOrCost: z.number().optional(),
    demandOrCapacity: z.number().int().optional(),
    incompatibleVehicles: z.number().int().array().optional(),
});

export type PointJson = z.infer<typeof pointJsonSchema>;

export const linkJsonSchema = z.object({
    startPointId: z.number().int(),
    endPointId: z.number().int(),
    name: z.string().optional(),
    isDirected: z.boolean().optional(),
    distance: z.number().optional(),
    time: z.number().optional(),
    fixedCost: z.number().optional(),
});

export type LinkJson = z.infer<typeof linkJsonSchema>;

const printLevelSchema = z.union([
    z.literal(PRINT_LEVELS[0]),
    z.literal(PRINT_LEVELS[1]),
    z.literal(PRINT_LEVELS[2]),
    z.literal(PRINT_LEVELS[3]),
    z.literal(PRINT_LEVELS[4]),
]);

export const parametersJsonSchema = z.object({
    timeLimit: z.number(),
    action: z.enum(ACTIONS),
    upperBound: z.number().optional(),
    heuristicUsed: z.boolean().optional(),
    timeLimitHeuristic: z.number().optional(),
    configFile: z.string().optional(),
    solverName: z.enum(SOLVERS).optional(),
    printLevel: printLevelSchema.optional(),
});

export type ParametersJson = z.infer<typeof parametersJsonSchema>;

/** Document handed to the engine's solve entry point */
export const requestDocumentSchema = z.object({
    Points: pointJsonSchema.array(),
    VehicleTypes: vehicleTypeJsonSchema.array(),
    Links: linkJsonSchema.array(),
    Parameters: parametersJsonSchema,
});

export type RequestDocument = z.infer<typeof requestDocumentSchema>;
