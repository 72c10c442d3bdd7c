/**
 * @file solve-example.ts
 * @description
 * Builds a small capacitated routing problem (one depot, two customers, one vehicle
 * type), prints the request, solves it with the native engine and prints the routes.
 *
 * Usage: `npm run example [-- <output dir>]`. With an output directory the request and
 * the response are also exported there.
 */

import { Model } from './src';

const buildModel = () => {
    const model = new Model();

    model.addVehicleType({ id: 1, startPointId: 0, endPointId: 0, capacity: 10, maxNumber: 3 });

    model.addDepot({ id: 0, name: 'Depot' });
    model.addCustomer({ id: 1, name: 'C1', demand: 4 });
    model.addCustomer({ id: 2, name: 'C2', demand: 6 });

    model.addLink({ name: '0-1', startPointId: 0, endPointId: 1, distance: 10, time: 10 });
    model.addLink({ name: '0-2', startPointId: 0, endPointId: 2, distance: 12, time: 12 });
    model.addLink({ name: '1-2', startPointId: 1, endPointId: 2, distance: 5, time: 5 });

    model.setParameters({ timeLimit: 30 });

    return model;
};

const main = async () => {
    const outputDir = process.argv[2];
    const model = buildModel();

    console.log(model.toString());

    const solution = model.solve();
    console.log(`Status ${solution.status}: ${solution.message}`);

    if (!solution.statistics.isEmpty()) {
        console.log(`Solution value: ${solution.statistics.solutionValue}`);
    }

    for (const route of solution.routes) {
        console.log(
            `Vehicle type ${route.vehicleTypeId} (cost ${route.routeCost}): ${route.pointNames.join(' -> ')}`,
        );
    }

    if (outputDir) {
        console.log(`Request written to ${await model.export('instance', outputDir)}`);
        console.log(`Response written to ${await solution.export('solution', outputDir)}`);
    }
};

main().catch(err => {
    console.error(err);
    process.exit(1);
});
