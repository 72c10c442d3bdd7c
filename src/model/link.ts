import { LinkJson, linkJsonSchema } from '../types/request';
import { compactFields } from './compaction';
import { asBoolean, asNonNegativeInteger, asNonNegativeNumber, asNumber, asString } from './validate';

export interface LinkOptions {
    name?: string;
    /** When false, distance, time and cost apply in both directions */
    isDirected?: boolean;
    startPointId?: number;
    endPointId?: number;
    distance?: number;
    time?: number;
    fixedCost?: number;
}

export class Link {
    private _name = '';
    private _isDirected = false;
    private _startPointId = 0;
    private _endPointId = 0;
    private _distance = 0;
    private _time = 0;
    private _fixedCost = 0;

    constructor({
        name = '',
        isDirected = false,
        startPointId = 0,
        endPointId = 0,
        distance = 0,
        time = 0,
        fixedCost = 0,
    }: LinkOptions = {}) {
        this.name = name;
        this.isDirected = isDirected;
        this.startPointId = startPointId;
        this.endPointId = endPointId;
        this.distance = distance;
        this.time = time;
        this.fixedCost = fixedCost;
    }

    get name(): string {
        return this._name;
    }

    set name(value: unknown) {
        this._name = asString('name', value);
    }

    get isDirected(): boolean {
        return this._isDirected;
    }

    set isDirected(value: unknown) {
        this._isDirected = asBoolean('isDirected', value);
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

    get distance(): number {
        return this._distance;
    }

    set distance(value: unknown) {
        this._distance = asNonNegativeNumber('distance', value);
    }

    get time(): number {
        return this._time;
    }

    set time(value: unknown) {
        this._time = asNonNegativeNumber('time', value);
    }

    get fixedCost(): number {
        return this._fixedCost;
    }

    set fixedCost(value: unknown) {
        this._fixedCost = asNumber('fixedCost', value);
    }

    toJson(debug = false): LinkJson {
        return linkJsonSchema.parse(
            compactFields(
                [
                    { key: 'startPointId', value: this._startPointId },
                    { key: 'endPointId', value: this._endPointId },
                    { key: 'name', value: this._name, defaultValue: '' },
                    { key: 'isDirected', value: this._isDirected, defaultValue: false },
                    { key: 'distance', value: this._distance, defaultValue: 0 },
                    { key: 'time', value: this._time, defaultValue: 0 },
                    { key: 'fixedCost', value: this._fixedCost, defaultValue: 0 },
                ],
                debug,
            ),
        );
    }

    toString(): string {
        return JSON.stringify(this.toJson());
    }
}
