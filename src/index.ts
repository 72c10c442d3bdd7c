export { Model } from './model/model';
export { VehicleType, type VehicleTypeOptions } from './model/vehicle-type';
export {
    Point,
    Customer,
    Depot,
    type PointOptions,
    type CustomerOptions,
    type DepotOptions,
} from './model/point';
export { Link, type LinkOptions } from './model/link';
export { Parameters, type ParametersOptions } from './model/parameters';
export { Registry, type RegistryOptions, type Registrable } from './model/registry';
export {
    createLinkRegistry,
    createPointRegistry,
    createVehicleTypeRegistry,
    type LinkRegistry,
    type PointRegistry,
    type VehicleTypeRegistry,
} from './model/registries';

export { Solution } from './solution/solution';
export { Route } from './solution/route';
export { Statistics } from './solution/statistics';

export { Engine, invokeEngine, type EngineOptions } from './engine/engine';
export { loadEngineConfig, type EngineConfig } from './engine/config';
export { resolvePlatform, type EnginePlatform, type PlatformName } from './engine/platform';
export { engineCandidates, loadEngineLibrary, type LoadedEngine } from './engine/discovery';
export {
    KoffiLibraryLoader,
    type LibraryLoader,
    type NativeBuffer,
    type NativeEngineLibrary,
} from './engine/native-library';
export { nodeProcessHost, type ProcessHost } from './engine/process-host';

export {
    ModelError,
    ValidationError,
    type ModelErrorCode,
    type ValidationConstraint,
    type ValidationErrorDetails,
} from './errors';
export * from './constants';
export * from './types/request';
export * from './types/response';
