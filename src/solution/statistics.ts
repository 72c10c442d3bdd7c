import { StatisticsJson } from '../types/response';

/**
 * Figures reported by the engine after an optimization run. An empty instance
 * (all fields undefined) stands for responses whose status carries no statistics.
 */
export class Statistics {
    readonly solutionTime?: number;
    /** Value of the best solution found */
    readonly solutionValue?: number;
    readonly bestLowerBound?: number;
    readonly rootLowerBound?: number;
    /** Time spent solving the root relaxation */
    readonly rootTime?: number;
    readonly branchAndBoundNodes?: number;

    constructor(json?: StatisticsJson) {
        if (json) {
            this.solutionTime = json.solutionTime;
            this.solutionValue = json.solutionValue;
            this.bestLowerBound = json.bestLB;
            this.rootLowerBound = json.rootLB;
            this.rootTime = json.rootTime;
            this.branchAndBoundNodes = json.nbBranchAndBoundNodes;
        }
        Object.freeze(this);
    }

    isEmpty(): boolean {
        return this.solutionTime === undefined;
    }
}
