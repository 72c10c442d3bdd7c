import { writeFile } from 'fs/promises';
import path from 'path';

import { DEPOT_CUSTOMER_ID } from '../constants';
import { Engine } from '../engine/engine';
import { ModelError } from '../errors';
import { Solution } from '../solution/solution';
import { RequestDocument } from '../types/request';
import { Link, LinkOptions } from './link';
import { Parameters, ParametersOptions } from './parameters';
import { Customer, CustomerOptions, Depot, DepotOptions, Point, PointOptions } from './point';
import {
    createLinkRegistry,
    createPointRegistry,
    createVehicleTypeRegistry,
    LinkRegistry,
    PointRegistry,
    VehicleTypeRegistry,
} from './registries';
import { VehicleType, VehicleTypeOptions } from './vehicle-type';

/**
 * A routing problem under construction: vehicle types, points, links and solver
 * parameters. Entities are validated as they are added; the "at least one of each"
 * rule is only checked when the request is built.
 */
export class Model {
    readonly vehicleTypes: VehicleTypeRegistry = createVehicleTypeRegistry();
    readonly points: PointRegistry = createPointRegistry();
    readonly links: LinkRegistry = createLinkRegistry();
    private _parameters = new Parameters();
    private _solution = new Solution();

    get parameters(): Parameters {
        return this._parameters;
    }

    /** Result of the last `solve`; empty before the first one */
    get solution(): Solution {
        return this._solution;
    }

    addVehicleType(options: VehicleTypeOptions): VehicleType {
        if (this.vehicleTypes.has(options.id)) {
            throw new ModelError('DUPLICATE_VEHICLE_TYPE', { detail: String(options.id) });
        }
        const vehicleType = new VehicleType(options);
        this.vehicleTypes.add(vehicleType);
        return vehicleType;
    }

    deleteVehicleType(id: number): void {
        this.vehicleTypes.delete(id);
    }

    /** Adds a raw point; `idCustomer` 0 makes it a depot */
    addPoint(options: PointOptions): Point {
        return this.insertPoint(options.id, () => new Point(options));
    }

    /** Adds a customer; without an `idCustomer` (or with 0) it takes the point's own id */
    addCustomer({ idCustomer, ...options }: CustomerOptions): Customer {
        const customerId = idCustomer === undefined || idCustomer === DEPOT_CUSTOMER_ID ? options.id : idCustomer;
        return this.insertPoint(options.id, () => new Customer({ ...options, idCustomer: customerId }));
    }

    addDepot(options: DepotOptions): Depot {
        return this.insertPoint(options.id, () => new Depot(options));
    }

    deletePoint(id: number): void {
        this.points.delete(id);
    }

    deleteCustomer(id: number): void {
        this.deletePoint(id);
    }

    deleteDepot(id: number): void {
        this.deletePoint(id);
    }

    addLink(options: LinkOptions = {}): Link {
        const name = options.name ?? '';
        if (this.links.has(name)) {
            throw new ModelError('DUPLICATE_LINK', { detail: name });
        }
        const link = new Link(options);
        this.links.add(link);
        return link;
    }

    deleteLink(name: string): void {
        this.links.delete(name);
    }

    /** Replaces every parameter; fields left out take their defaults */
    setParameters(options: ParametersOptions = {}): Parameters {
        this._parameters = new Parameters(options);
        return this._parameters;
    }

    /**
     * Request document for the engine. Only non-default fields are included unless
     * `debug` is set.
     */
    toRequest(debug = false): RequestDocument {
        return {
            Points: this.points.materialize(debug),
            VehicleTypes: this.vehicleTypes.materialize(debug),
            Links: this.links.materialize(debug),
            Parameters: this._parameters.toJson(debug),
        };
    }

    serialize(debug = false): string {
        return JSON.stringify(this.toRequest(debug), null, 1);
    }

    toString(): string {
        return this.serialize();
    }

    /** Writes the full request to `<name>.json` for sharing or debugging; the engine never reads it */
    async export(name = 'instance', directory = '.'): Promise<string> {
        const filePath = path.resolve(directory, `${name}.json`);
        await writeFile(filePath, this.serialize(true));
        return filePath;
    }

    /** Blocks until the engine returns; the previous solution is replaced */
    solve(engine: Engine = new Engine()): Solution {
        this._solution = engine.solve(this.serialize(), this._parameters.cplexPath);
        return this._solution;
    }

    private insertPoint<P extends Point>(id: number, create: () => P): P {
        if (this.points.has(id)) {
            throw new ModelError('DUPLICATE_POINT', { detail: String(id) });
        }
        const point = create();
        this.points.add(point);
        return point;
    }
}
