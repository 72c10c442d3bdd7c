/** Highest number of points the engine's binary format can hold */
export const MAX_POINTS = 1022;
export const MAX_POINT_ID = 10000;
export const MAX_CUSTOMER_ID = 1022;

/** `idCustomer` of depots and of points not bound to a customer */
export const DEPOT_CUSTOMER_ID = 0;

export const SOLVERS = ['CLP', 'CPLEX'] as const;
export type SolverName = (typeof SOLVERS)[number];

export const PRINT_LEVELS = [-2, -1, 0, 1, 2] as const;
export type PrintLevel = (typeof PRINT_LEVELS)[number];

export const ACTIONS = ['solve', 'enumAllFeasibleRoutes'] as const;
export type Action = (typeof ACTIONS)[number];

export const PARAMETER_DEFAULTS = {
    timeLimit: 300,
    upperBound: 1000000,
    heuristicUsed: false,
    timeLimitHeuristic: 20,
    configFile: '',
    solverName: 'CLP',
    printLevel: -1,
    action: 'solve',
    cplexPath: '',
} as const;

// Status codes for which the engine reports bounds and statistics
export const SOLVED_STATUS_MIN = 3;
export const SOLVED_STATUS_MAX = 5;
export const ROUTES_ENUMERATED_STATUS = 8;

export const isSolvedStatus = (code: number): boolean => code >= SOLVED_STATUS_MIN && code <= SOLVED_STATUS_MAX;

export const hasRoutes = (code: number): boolean => isSolvedStatus(code) || code === ROUTES_ENUMERATED_STATUS;
