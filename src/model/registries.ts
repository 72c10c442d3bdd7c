import z from 'zod';

import { MAX_POINTS } from '../constants';
import { LinkJson, PointJson, VehicleTypeJson } from '../types/request';
import { Link } from './link';
import { Point } from './point';
import { Registry } from './registry';
import { VehicleType } from './vehicle-type';

export type VehicleTypeRegistry = Registry<number, VehicleType, VehicleTypeJson>;
export type PointRegistry = Registry<number, Point, PointJson>;
export type LinkRegistry = Registry<string, Link, LinkJson>;

const idSchema = z.number().int();
const nameSchema = z.string();

export const createVehicleTypeRegistry = (): VehicleTypeRegistry =>
    new Registry<number, VehicleType, VehicleTypeJson>({
        kind: 'vehicle type',
        keySchema: idSchema,
        keyDescription: 'an integer id',
        accepts: (value): value is VehicleType => value instanceof VehicleType,
        keyOf: vehicleType => vehicleType.id,
        missingError: 'UNKNOWN_VEHICLE_TYPE',
        emptyError: 'NO_VEHICLE_TYPES',
    });

// Customers and depots share one id space
export const createPointRegistry = (): PointRegistry =>
    new Registry<number, Point, PointJson>({
        kind: 'point',
        keySchema: idSchema,
        keyDescription: 'an integer id',
        accepts: (value): value is Point => value instanceof Point,
        keyOf: point => point.id,
        missingError: 'UNKNOWN_POINT',
        emptyError: 'NO_POINTS',
        capacity: MAX_POINTS,
    });

export const createLinkRegistry = (): LinkRegistry =>
    new Registry<string, Link, LinkJson>({
        kind: 'link',
        keySchema: nameSchema,
        keyDescription: 'a string name',
        accepts: (value): value is Link => value instanceof Link,
        keyOf: link => link.name,
        missingError: 'UNKNOWN_LINK',
        emptyError: 'NO_LINKS',
    });
