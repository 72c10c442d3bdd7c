import { writeFile } from 'fs/promises';
import path from 'path';

import { hasRoutes, isSolvedStatus } from '../constants';
import { ResponseDocument, responseDocumentSchema, routeJsonSchema, statisticsJsonSchema } from '../types/response';
import { Route } from './route';
import { Statistics } from './statistics';

/**
 * Engine response. Statistics are only read for solved-range status codes and routes
 * only for those codes or for enumerated routes; for any other status both stay empty
 * whatever the document contains.
 */
export class Solution {
    readonly status: number;
    readonly message: string;
    readonly statistics: Statistics;
    readonly routes: ReadonlyArray<Route>;

    constructor(readonly json?: ResponseDocument) {
        if (!json) {
            this.status = 0;
            this.message = '';
            this.statistics = new Statistics();
            this.routes = Object.freeze([]);
            return;
        }

        this.status = json.Status.code;
        this.message = json.Status.message;
        this.statistics = isSolvedStatus(this.status)
            ? new Statistics(statisticsJsonSchema.parse(json.Statistics))
            : new Statistics();
        this.routes = Object.freeze(
            hasRoutes(this.status) ? routeJsonSchema.array().parse(json.Solution ?? []).map(r => new Route(r)) : [],
        );
    }

    /** Parses the engine's response text; throws on malformed JSON or a document that breaks the schema */
    static parse(text: string): Solution {
        return new Solution(responseDocumentSchema.parse(JSON.parse(text)));
    }

    toString(): string {
        return JSON.stringify(this.json ?? {}, null, 1);
    }

    /** Writes the raw response to `<name>.json` for sharing or debugging */
    async export(name = 'instance', directory = '.'): Promise<string> {
        const filePath = path.resolve(directory, `${name}.json`);
        await writeFile(filePath, this.toString());
        return filePath;
    }
}
