import { DEPOT_CUSTOMER_ID, MAX_CUSTOMER_ID, MAX_POINT_ID } from '../constants';
import { PointJson, pointJsonSchema } from '../types/request';
import { compactFields } from './compaction';
import {
    asBoundedInteger,
    asIntegerList,
    asNonNegativeInteger,
    asNumber,
    asNumberPair,
    asString,
} from './validate';

interface CommonPointOptions {
    id: number;
    name?: string;
    /** Loading or unloading time spent at the point */
    serviceTime?: number;
    twBegin?: number;
    twEnd?: number;
    /** Ids of vehicle types that may not serve this point */
    incompatibleVehicles?: ReadonlyArray<number>;
}

export interface PointOptions extends CommonPointOptions {
    /** 0 for depots and points not bound to a customer */
    idCustomer?: number;
    penaltyOrCost?: number;
    demandOrCapacity?: number;
}

export interface CustomerOptions extends CommonPointOptions {
    idCustomer?: number;
    /** Cost of leaving the customer unvisited */
    penalty?: number;
    demand?: number;
}

export interface DepotOptions extends CommonPointOptions {
    /** Cost of using the depot */
    cost?: number;
    capacity?: number;
}

/**
 * A node of the routing graph. Customers and depots share this representation:
 * `penaltyOrCost` is a customer's penalty or a depot's cost, `demandOrCapacity` a
 * customer's demand or a depot's capacity.
 *
 * `twBegin <= twEnd` is not checked here.
 */
export class Point {
    private _id = 0;
    private _name = '';
    private _idCustomer = DEPOT_CUSTOMER_ID;
    private _serviceTime = 0;
    private _twBegin = 0;
    private _twEnd = 0;
    private _penaltyOrCost = 0;
    private _demandOrCapacity = 0;
    private _incompatibleVehicles: ReadonlyArray<number> = [];

    constructor({
        id,
        name = '',
        idCustomer = DEPOT_CUSTOMER_ID,
        serviceTime = 0,
        twBegin = 0,
        twEnd = 0,
        penaltyOrCost = 0,
        demandOrCapacity = 0,
        incompatibleVehicles = [],
    }: PointOptions) {
        this.id = id;
        this.name = name;
        this.idCustomer = idCustomer;
        this.serviceTime = serviceTime;
        this.twBegin = twBegin;
        this.twEnd = twEnd;
        this.penaltyOrCost = penaltyOrCost;
        this.demandOrCapacity = demandOrCapacity;
        this.incompatibleVehicles = incompatibleVehicles;
    }

    get id(): number {
        return this._id;
    }

    set id(value: unknown) {
        this._id = asBoundedInteger('id', value, 0, MAX_POINT_ID);
    }

    get name(): string {
        return this._name;
    }

    set name(value: unknown) {
        this._name = asString('name', value);
    }

    get idCustomer(): number {
        return this._idCustomer;
    }

    set idCustomer(value: unknown) {
        this._idCustomer = asBoundedInteger('idCustomer', value, 0, MAX_CUSTOMER_ID);
    }

    get serviceTime(): number {
        return this._serviceTime;
    }

    set serviceTime(value: unknown) {
        this._serviceTime = asNumber('serviceTime', value);
    }

    get twBegin(): number {
        return this._twBegin;
    }

    set twBegin(value: unknown) {
        this._twBegin = asNumber('twBegin', value);
    }

    get twEnd(): number {
        return this._twEnd;
    }

    set twEnd(value: unknown) {
        this._twEnd = asNumber('twEnd', value);
    }

    get timeWindows(): [number, number] {
        return [this._twBegin, this._twEnd];
    }

    set timeWindows(value: unknown) {
        [this._twBegin, this._twEnd] = asNumberPair('timeWindows', value);
    }

    get penaltyOrCost(): number {
        return this._penaltyOrCost;
    }

    set penaltyOrCost(value: unknown) {
        this._penaltyOrCost = asNumber('penaltyOrCost', value);
    }

    get penalty(): number {
        return this._penaltyOrCost;
    }

    set penalty(value: unknown) {
        this._penaltyOrCost = asNumber('penalty', value);
    }

    get cost(): number {
        return this._penaltyOrCost;
    }

    set cost(value: unknown) {
        this._penaltyOrCost = asNumber('cost', value);
    }

    get demandOrCapacity(): number {
        return this._demandOrCapacity;
    }

    set demandOrCapacity(value: unknown) {
        this._demandOrCapacity = asNonNegativeInteger('demandOrCapacity', value);
    }

    get demand(): number {
        return this._demandOrCapacity;
    }

    set demand(value: unknown) {
        this._demandOrCapacity = asNonNegativeInteger('demand', value);
    }

    get capacity(): number {
        return this._demandOrCapacity;
    }

    set capacity(value: unknown) {
        this._demandOrCapacity = asNonNegativeInteger('capacity', value);
    }

    get incompatibleVehicles(): ReadonlyArray<number> {
        return this._incompatibleVehicles;
    }

    set incompatibleVehicles(value: unknown) {
        this._incompatibleVehicles = Object.freeze(asIntegerList('incompatibleVehicles', value));
    }

    toJson(debug = false): PointJson {
        return pointJsonSchema.parse(
            compactFields(
                [
                    { key: 'id', value: this._id },
                    { key: 'name', value: this._name, defaultValue: '' },
                    { key: 'idCustomer', value: this._idCustomer, defaultValue: 0 },
                    { key: 'serviceTime', value: this._serviceTime, defaultValue: 0 },
                    { key: 'twBegin', value: this._twBegin, defaultValue: 0 },
                    { key: 'twEnd', value: this._twEnd, defaultValue: 0 },
                    { key: 'penaltyOrCost', value: this._penaltyOrCost, defaultValue: 0 },
                    { key: 'demandOrCapacity', value: this._demandOrCapacity, defaultValue: 0 },
                    { key: 'incompatibleVehicles', value: this._incompatibleVehicles, defaultValue: [] },
                ],
                debug,
            ),
        );
    }

    toString(): string {
        return JSON.stringify(this.toJson());
    }
}

export class Customer extends Point {
    constructor({ idCustomer, penalty = 0, demand = 0, ...common }: CustomerOptions) {
        super({ ...common, idCustomer, penaltyOrCost: penalty, demandOrCapacity: demand });
    }
}

export class Depot extends Point {
    constructor({ cost = 0, capacity = 0, ...common }: DepotOptions) {
        super({ ...common, idCustomer: DEPOT_CUSTOMER_ID, penaltyOrCost: cost, demandOrCapacity: capacity });
    }
}
