import z from 'zod';

export const statusJsonSchema = z.object({
    code: z.number().int(),
    message: z.string(),
});

export type StatusJson = z.infer<typeof statusJsonSchema>;

export const statisticsJsonSchema = z.object({
    solutionTime: z.number(),
    solutionValue: z.number(),
    bestLB: z.number(),
    rootLB: z.number(),
    rootTime: z.number(),
    nbBranchAndBoundNodes: z.number(),
});

export type StatisticsJson = z.infer<typeof statisticsJsonSchema>;

const visitedPointJsonSchema = z.object({
    pointId: z.number().int(),
    pointName: z.string(),
    load: z.number(), // cumulative
    time: z.number(), // cumulative
    incomingArcName: z.string(),
});

export type VisitedPointJson = z.infer<typeof visitedPointJsonSchema>;

export const routeJsonSchema = z.object({
    vehicleTypeId: z.number().int(),
    routeCost: z.number(),
    visitedPoints: visitedPointJsonSchema.array(),
});

export type RouteJson = z.infer<typeof routeJsonSchema>;

// Statistics and routes are only read for some status codes, so they stay untyped here
export const responseDocumentSchema = z.object({
    Status: statusJsonSchema,
    Statistics: z.unknown().optional(),
    Solution: z.unknown().optional(),
});

export type ResponseDocument = z.infer<typeof responseDocumentSchema>;
