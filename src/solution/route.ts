import { RouteJson } from '../types/response';

/**
 * One vehicle's tour. The per-visit arrays are parallel: index i of each describes
 * the i-th visited point.
 */
export class Route {
    readonly vehicleTypeId: number;
    readonly routeCost: number;
    readonly pointIds: ReadonlyArray<number>;
    readonly pointNames: ReadonlyArray<string>;
    /** Load carried on arrival at each visit */
    readonly capConsumption: ReadonlyArray<number>;
    /** Elapsed time on arrival at each visit */
    readonly timeConsumption: ReadonlyArray<number>;
    /** Name of the link used to reach each visit */
    readonly incomingArcNames: ReadonlyArray<string>;

    constructor(readonly json: RouteJson) {
        const pointIds: number[] = [];
        const pointNames: string[] = [];
        const capConsumption: number[] = [];
        const timeConsumption: number[] = [];
        const incomingArcNames: string[] = [];

        for (const visit of json.visitedPoints) {
            pointIds.push(visit.pointId);
            pointNames.push(visit.pointName);
            capConsumption.push(visit.load);
            timeConsumption.push(visit.time);
            incomingArcNames.push(visit.incomingArcName);
        }

        this.vehicleTypeId = json.vehicleTypeId;
        this.routeCost = json.routeCost;
        this.pointIds = Object.freeze(pointIds);
        this.pointNames = Object.freeze(pointNames);
        this.capConsumption = Object.freeze(capConsumption);
        this.timeConsumption = Object.freeze(timeConsumption);
        this.incomingArcNames = Object.freeze(incomingArcNames);
        Object.freeze(this);
    }

    toString(): string {
        return JSON.stringify(this.json);
    }
}
