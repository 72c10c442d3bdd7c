import { Action, ACTIONS, PARAMETER_DEFAULTS, PRINT_LEVELS, PrintLevel, SolverName, SOLVERS } from '../constants';
import { ParametersJson, parametersJsonSchema } from '../types/request';
import { compactFields } from './compaction';
import { asBoolean, asMember, asNonNegativeNumber, asNumber, asString } from './validate';

export interface ParametersOptions {
    /** Seconds the engine may spend before stopping */
    timeLimit?: number;
    /** Cost the engine tries to beat; a cutoff hint, not a constraint */
    upperBound?: number;
    heuristicUsed?: boolean;
    timeLimitHeuristic?: number;
    /** Path of an engine configuration file with advanced settings */
    configFile?: string;
    solverName?: SolverName;
    printLevel?: PrintLevel;
    action?: Action;
    /** Path of an alternate solver library to load before the engine */
    cplexPath?: string;
}

export class Parameters {
    private _timeLimit: number = PARAMETER_DEFAULTS.timeLimit;
    private _upperBound: number = PARAMETER_DEFAULTS.upperBound;
    private _heuristicUsed: boolean = PARAMETER_DEFAULTS.heuristicUsed;
    private _timeLimitHeuristic: number = PARAMETER_DEFAULTS.timeLimitHeuristic;
    private _configFile: string = PARAMETER_DEFAULTS.configFile;
    private _solverName: SolverName = PARAMETER_DEFAULTS.solverName;
    private _printLevel: PrintLevel = PARAMETER_DEFAULTS.printLevel;
    private _action: Action = PARAMETER_DEFAULTS.action;
    private _cplexPath: string = PARAMETER_DEFAULTS.cplexPath;

    constructor({
        timeLimit = PARAMETER_DEFAULTS.timeLimit,
        upperBound = PARAMETER_DEFAULTS.upperBound,
        heuristicUsed = PARAMETER_DEFAULTS.heuristicUsed,
        timeLimitHeuristic = PARAMETER_DEFAULTS.timeLimitHeuristic,
        configFile = PARAMETER_DEFAULTS.configFile,
        solverName = PARAMETER_DEFAULTS.solverName,
        printLevel = PARAMETER_DEFAULTS.printLevel,
        action = PARAMETER_DEFAULTS.action,
        cplexPath = PARAMETER_DEFAULTS.cplexPath,
    }: ParametersOptions = {}) {
        this.timeLimit = timeLimit;
        this.upperBound = upperBound;
        this.heuristicUsed = heuristicUsed;
        this.timeLimitHeuristic = timeLimitHeuristic;
        this.configFile = configFile;
        this.solverName = solverName;
        this.printLevel = printLevel;
        this.action = action;
        this.cplexPath = cplexPath;
    }

    get timeLimit(): number {
        return this._timeLimit;
    }

    set timeLimit(value: unknown) {
        this._timeLimit = asNonNegativeNumber('timeLimit', value);
    }

    get upperBound(): number {
        return this._upperBound;
    }

    set upperBound(value: unknown) {
        this._upperBound = asNumber('upperBound', value);
    }

    get heuristicUsed(): boolean {
        return this._heuristicUsed;
    }

    set heuristicUsed(value: unknown) {
        this._heuristicUsed = asBoolean('heuristicUsed', value);
    }

    get timeLimitHeuristic(): number {
        return this._timeLimitHeuristic;
    }

    set timeLimitHeuristic(value: unknown) {
        this._timeLimitHeuristic = asNonNegativeNumber('timeLimitHeuristic', value);
    }

    get configFile(): string {
        return this._configFile;
    }

    set configFile(value: unknown) {
        this._configFile = asString('configFile', value);
    }

    get solverName(): SolverName {
        return this._solverName;
    }

    set solverName(value: unknown) {
        this._solverName = asMember('solverName', value, SOLVERS);
    }

    get printLevel(): PrintLevel {
        return this._printLevel;
    }

    set printLevel(value: unknown) {
        this._printLevel = asMember('printLevel', value, PRINT_LEVELS);
    }

    get action(): Action {
        return this._action;
    }

    set action(value: unknown) {
        this._action = asMember('action', value, ACTIONS);
    }

    get cplexPath(): string {
        return this._cplexPath;
    }

    set cplexPath(value: unknown) {
        this._cplexPath = asString('cplexPath', value);
    }

    /** `cplexPath` never goes on the wire: the binding loads that library itself */
    toJson(debug = false): ParametersJson {
        return parametersJsonSchema.parse(
            compactFields(
                [
                    { key: 'timeLimit', value: this._timeLimit },
                    { key: 'action', value: this._action },
                    { key: 'upperBound', value: this._upperBound, defaultValue: PARAMETER_DEFAULTS.upperBound },
                    {
                        key: 'heuristicUsed',
                        value: this._heuristicUsed,
                        defaultValue: PARAMETER_DEFAULTS.heuristicUsed,
                    },
                    {
                        key: 'timeLimitHeuristic',
                        value: this._timeLimitHeuristic,
                        defaultValue: PARAMETER_DEFAULTS.timeLimitHeuristic,
                    },
                    { key: 'configFile', value: this._configFile, defaultValue: PARAMETER_DEFAULTS.configFile },
                    { key: 'solverName', value: this._solverName, defaultValue: PARAMETER_DEFAULTS.solverName },
                    { key: 'printLevel', value: this._printLevel, defaultValue: PARAMETER_DEFAULTS.printLevel },
                ],
                debug,
            ),
        );
    }

    toString(): string {
        return JSON.stringify(this.toJson());
    }
}
