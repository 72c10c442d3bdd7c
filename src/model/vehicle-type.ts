import { VehicleTypeJson, vehicleTypeJsonSchema } from '../types/request';
import { compactFields } from './compaction';
import { asInteger, asNonNegativeInteger, asNumber, asString } from './validate';
import { ValidationError } from '../errors';

export interface VehicleTypeOptions {
    id: number;
    startPointId: number;
    endPointId: number;
    name?: string;
    capacity?: number;
    fixedCost?: number;
    /** Cost per unit of distance */
    varCostDist?: number;
    /** Cost per unit of time */
    varCostTime?: number;
    /** Number of available vehicles of this type */
    maxNumber?: number;
    twBegin?: number;
    twEnd?: number;
}

/** A class of vehicles sharing capacity, costs, depots and working hours */
export class VehicleType {
    private _id = 1;
    private _startPointId = 0;
    private _endPointId = 0;
    private _name = '';
    private _capacity = 0;
    private _fixedCost = 0;
    private _varCostDist = 0;
    private _varCostTime = 0;
    private _maxNumber = 1;
    private _twBegin = 0;
    private _twEnd = 0;

    constructor({
        id,
        startPointId,
        endPointId,
        name = '',
        capacity = 0,
        fixedCost = 0,
        varCostDist = 0,
        varCostTime = 0,
        maxNumber = 1,
        twBegin = 0,
        twEnd = 0,
    }: VehicleTypeOptions) {
        this.id = id;
        this.startPointId = startPointId;
        this.endPointId = endPointId;
        this.name = name;
        this.capacity = capacity;
        this.fixedCost = fixedCost;
        this.varCostDist = varCostDist;
        this.varCostTime = varCostTime;
        this.maxNumber = maxNumber;
        this.twBegin = twBegin;
        this.twEnd = twEnd;
    }

    get id(): number {
        return this._id;
    }

    // 0 is reserved by the engine
    set id(value: unknown) {
        const id = asInteger('id', value);
        if (id < 1) {
            throw new ValidationError('id', { constraint: 'range', expected: 'must be greater than or equal to 1' });
        }
        this._id = id;
    }

    get startPointId(): number {
        return this._startPointId;
    }

    set startPointId(value: unknown) {
        this._startPointId = asNonNegativeInteger('startPointId', value);
    }

    get endPointId(): number {
        return this._endPointId;
    }

    set endPointId(value: unknown) {
        this._endPointId = asNonNegativeInteger('endPointId', value);
    }

    get name(): string {
        return this._name;
    }

    set name(value: unknown) {
        this._name = asString('name', value);
    }

    get capacity(): number {
        return this._capacity;
    }

    set capacity(value: unknown) {
        this._capacity = asNonNegativeInteger('capacity', value);
    }

    get fixedCost(): number {
        return this._fixedCost;
    }

    set fixedCost(value: unknown) {
        this._fixedCost = asNumber('fixedCost', value);
    }

    get varCostDist(): number {
        return this._varCostDist;
    }

    set varCostDist(value: unknown) {
        this._varCostDist = asNumber('varCostDist', value);
    }

    get varCostTime(): number {
        return this._varCostTime;
    }

    set varCostTime(value: unknown) {
        this._varCostTime = asNumber('varCostTime', value);
    }

    get maxNumber(): number {
        return this._maxNumber;
    }

    set maxNumber(value: unknown) {
        this._maxNumber = asNonNegativeInteger('maxNumber', value);
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

    /** Wire form; fields equal to the engine's defaults are left out unless `debug` is set */
    toJson(debug = false): VehicleTypeJson {
        return vehicleTypeJsonSchema.parse(
            compactFields(
                [
                    { key: 'id', value: this._id },
                    { key: 'startPointId', value: this._startPointId },
                    { key: 'endPointId', value: this._endPointId },
                    { key: 'name', value: this._name, defaultValue: '' },
                    { key: 'capacity', value: this._capacity, defaultValue: 0 },
                    { key: 'fixedCost', value: this._fixedCost, defaultValue: 0 },
                    { key: 'varCostDist', value: this._varCostDist, defaultValue: 0 },
                    { key: 'varCostTime', value: this._varCostTime, defaultValue: 0 },
                    // omitted only at 0, so the constructor default of 1 is sent
                    { key: 'maxNumber', value: this._maxNumber, defaultValue: 0 },
                    { key: 'twBegin', value: this._twBegin, defaultValue: 0 },
                    { key: 'twEnd', value: this._twEnd, defaultValue: 0 },
                ],
                debug,
            ),
        );
    }

    toString(): string {
        return JSON.stringify(this.toJson());
    }
}
