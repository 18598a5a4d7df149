import { loadConfig, type EngineConfig } from './config';
import { Dispatch } from './dispatch';
import { Environment } from './environment';
import { AuthoringError } from './errors';
import { DEATH_BANNER, M_BEG, M_END, M_LOOK, M_OBJECT, PLAYER_ID, VICTORY_BANNER } from './globals';
import { logger } from './logger';
import { ObjectStore } from './object-store';
import { CR, renderTokens, type OutputToken } from './output';
import { Random } from './random';
import { GameTermination, RoutineExit, toRoutineValue, withBoundary } from './routine';
import { RoutineRegistry } from './routine-registry';
import { VerbTable } from './verb-table';
import type { GameObject } from './game-object';
import type {
    ActionHandler,
    CommandResolver,
    GlobalValue,
    InputSource,
    ObjectConfig,
    ObjectId,
    OutputSink,
    ResolvedCommand,
    Routine,
    RoutineValue,
    TerminationReason,
    TurnOutcome,
    VerbTag
} from './types';

export const PROMPT = '>';

/**
 * Registers a game's objects, verbs and routines. Runs on construction and
 * again on every reset.
 */
export type GameSetup = (game: Game) => void;

export interface GameOptions {
    sink: OutputSink;
    setup?: GameSetup;
    /**
     * Overrides for the environment configuration. `logLevel` and `logFile`
     * apply to the shared module logger, so the most recently constructed
     * game decides them for every game in the process.
     */
    config?: Partial<EngineConfig>;
}

interface EngineState {
    objects: ObjectStore;
    env: Environment;
    verbs: VerbTable;
    routines: RoutineRegistry;
    random: Random;
}

/**
 * One running game. Owns the object graph, the environment and both
 * registries; nothing outside the instance holds game state.
 */
export class Game {
    readonly sink: OutputSink;
    readonly config: EngineConfig;
    readonly dispatch: Dispatch;
    private readonly setup?: GameSetup;
    private state: EngineState;
    private _diagnostics: AuthoringError[] = [];
    private _ended: TerminationReason | null = null;

    constructor(options: GameOptions) {
        this.sink = options.sink;
        this.config = { ...loadConfig(), ...options.config };
        logger.configure(this.config.logLevel, this.config.logFile);
        this.setup = options.setup;
        this.dispatch = new Dispatch(() => this.state.env, () => this.state.verbs);
        this.state = this.createState();
        this.setup?.(this);
        logger.log(`[Game] Initialized with ${this.state.objects.ids().length} objects`);
    }

    /**
     * Clear and reseed every container, then run setup against the fresh
     * ones. If setup throws, the previous state stays in place.
     */
    reset(): void {
        const previous = {
            state: this.state,
            diagnostics: this._diagnostics,
            ended: this._ended
        };

        this.state = this.createState();
        this._diagnostics = [];
        this._ended = null;
        try {
            this.setup?.(this);
        } catch (error) {
            logger.error('[Game] Setup failed during reset, keeping previous state:', error);
            this.state = previous.state;
            this._diagnostics = previous.diagnostics;
            this._ended = previous.ended;
            throw error;
        }
        logger.log('[Game] Reset complete');
    }

    private createState(): EngineState {
        const objects = new ObjectStore(error => this.report(error));
        objects.define(PLAYER_ID, { desc: 'you' });
        return {
            objects,
            env: new Environment({
                'LOAD-MAX': this.config.loadMax,
                'LOAD-ALLOWED': this.config.loadMax
            }),
            verbs: new VerbTable(),
            routines: new RoutineRegistry(),
            random: new Random(this.config.rngSeed)
        };
    }

    get objects(): ObjectStore { return this.state.objects; }
    get env(): Environment { return this.state.env; }
    get verbs(): VerbTable { return this.state.verbs; }
    get routines(): RoutineRegistry { return this.state.routines; }

    /**
     * Authoring errors reported since the last reset.
     */
    get diagnostics(): AuthoringError[] {
        return [...this._diagnostics];
    }

    /**
     * How the game ended, or `null` while it is still running.
     */
    get ended(): TerminationReason | null {
        return this._ended;
    }

    report(error: AuthoringError): void {
        logger.warn(`[Game] Authoring error (${error.kind}): ${error.message}`);
        this._diagnostics.push(error);
    }

    // Setup-phase registration

    define(id: ObjectId, config: ObjectConfig = {}): GameObject {
        return this.state.objects.define(id, config);
    }

    registerVerb(name: string, tag: VerbTag): void {
        this.state.verbs.registerVerb(name, tag);
    }

    registerRoutine(name: string, routine: Routine): void {
        this.state.routines.registerRoutine(name, routine);
    }

    verbTag(name: string): VerbTag {
        return this.state.verbs.verbTag(name);
    }

    // Environment

    setg(name: string, value: GlobalValue): void {
        this.state.env.setg(name, value);
    }

    getg(name: string): GlobalValue | undefined {
        return this.state.env.getg(name);
    }

    /**
     * The current room, read from HERE.
     */
    here(): ObjectId | null {
        return this.objectGlobal('HERE');
    }

    winner(): ObjectId | null {
        return this.objectGlobal('WINNER');
    }

    private objectGlobal(name: string): ObjectId | null {
        const value = this.getg(name);
        return typeof value === 'string' ? value : null;
    }

    private increment(name: string, by: number): number {
        const current = this.getg(name);
        const next = (typeof current === 'number' ? current : 0) + by;
        this.setg(name, next);
        return next;
    }

    score(points: number): number {
        return this.increment('SCORE', points);
    }

    // Dispatch predicates

    verbMatches(...names: string[]): boolean {
        return this.dispatch.verbMatches(...names);
    }

    directObjectIs(...ids: ObjectId[]): boolean {
        return this.dispatch.directObjectIs(...ids);
    }

    indirectObjectIs(...ids: ObjectId[]): boolean {
        return this.dispatch.indirectObjectIs(...ids);
    }

    roomIs(...ids: ObjectId[]): boolean {
        return this.dispatch.roomIs(...ids);
    }

    /**
     * True when `id` is anywhere inside `holder` (the WINNER by default).
     */
    held(id: ObjectId, holder: ObjectId | null = this.winner()): boolean {
        return holder !== null && this.state.objects.isIn(id, holder);
    }

    // Output

    tell(...tokens: OutputToken[]): void {
        renderTokens(tokens, this.sink, {
            describe: id => this.state.objects.get(id)?.desc,
            report: error => this.report(error)
        });
    }

    /**
     * Print one line per object directly inside `containerId`, walking the
     * sibling chain. Returns how many lines were printed.
     */
    printContents(containerId: ObjectId): number {
        const objects = this.state.objects;
        let count = 0;
        for (let id = objects.first(containerId); id !== null; id = objects.next(id)) {
            this.tell('  ', objects.get(id)?.name ?? id, CR);
            count++;
        }
        return count;
    }

    // Routine execution

    /**
     * Invoke a registered routine inside its own exit boundary.
     * Unknown routines, and any call after the game has ended, yield `undefined`.
     */
    callRoutine(name: string, ...args: GlobalValue[]): RoutineValue {
        if (this._ended !== null) {
            logger.debug(`[Game] Skipping routine ${name}: game already ${this._ended}`);
            return undefined;
        }
        const routine = this.state.routines.getRoutine(name);
        if (!routine) {
            logger.debug(`[Game] No routine registered as ${name}`);
            return undefined;
        }
        return withBoundary(routine, this, ...args);
    }

    /**
     * Run an action handler inside its own exit boundary.
     */
    invoke(handler: ActionHandler, message: string): RoutineValue {
        if (this._ended !== null) {
            return undefined;
        }
        return withBoundary(handler, message, this);
    }

    private runAction(id: ObjectId | null, message: string): RoutineValue {
        if (id === null) return undefined;
        const action = this.state.objects.get(id)?.action;
        return action ? this.invoke(action, message) : undefined;
    }

    /**
     * Set the parser pointers and give each handler a chance at the command:
     * the room (M-BEG), the indirect object, the direct object, then the
     * routine registered under the verb's tag. The first truthy result wins.
     * The room then always sees M-END.
     */
    perform(verb: string, prso: ObjectId | null = null, prsi: ObjectId | null = null): RoutineValue {
        const tag = this.verbTag(verb);
        this.setg('PRSA', tag);
        this.setg('PRSO', prso);
        this.setg('PRSI', prsi);
        logger.debug(`[Game] perform ${tag}`, { prso, prsi });

        const here = this.here();
        const steps: Array<() => RoutineValue> = [
            () => this.runAction(here, M_BEG),
            () => this.runAction(prsi, M_OBJECT),
            () => this.runAction(prso, M_OBJECT),
            () => this.callRoutine(tag)
        ];

        let handled: RoutineValue = false;
        for (const step of steps) {
            const result = step();
            if (result) {
                handled = result;
                break;
            }
        }

        this.runAction(here, M_END);
        return handled;
    }

    // Randomness

    random(n: number): number {
        return this.state.random.random(n);
    }

    pickOne<T>(items: readonly T[]): T | undefined {
        return this.state.random.pickOne(items);
    }

    prob(percent: number): boolean {
        return this.state.random.prob(percent);
    }

    // Termination and movement

    /**
     * Kill the player: print the message and the death banner, then unwind
     * to the game loop.
     */
    jigsUp(message: string): never {
        this.tell(message, CR, CR, DEATH_BANNER, CR);
        this.setg('DEAD-FLAG', true);
        this._ended = 'died';
        logger.log('[Game] Player died:', message);
        throw new GameTermination('died');
    }

    finish(): never {
        this.tell(VICTORY_BANNER, CR);
        this.setg('WON-FLAG', true);
        this._ended = 'won';
        logger.log('[Game] Player won');
        throw new GameTermination('won');
    }

    /**
     * Enter a room: update HERE, move the WINNER there and let the room
     * describe itself with M-LOOK.
     */
    goto(roomId: ObjectId): void {
        this.setg('HERE', roomId);
        const winner = this.winner();
        if (winner !== null) {
            this.state.objects.move(winner, roomId);
        }
        this.runAction(roomId, M_LOOK);
    }

    // Game loop

    /**
     * Run `block` at the game-loop boundary. Termination becomes an `ended`
     * outcome; a routine exit with no routine to return from is reported.
     */
    play(block: (game: Game) => unknown): TurnOutcome {
        if (this._ended !== null) {
            return { status: 'ended', reason: this._ended };
        }
        try {
            return { status: 'continue', handled: toRoutineValue(block(this)) };
        } catch (signal) {
            if (signal instanceof GameTermination) {
                return { status: 'ended', reason: signal.reason };
            }
            if (signal instanceof RoutineExit) {
                this.report(new AuthoringError('stray-exit', 'Routine exit raised outside of any routine'));
                return { status: 'continue', handled: signal.value };
            }
            throw signal;
        }
    }

    /**
     * Perform one resolved command and count the move.
     */
    runTurn(command: ResolvedCommand): TurnOutcome {
        const outcome = this.play(game => game.perform(command.verb, command.direct ?? null, command.indirect ?? null));
        if (outcome.status === 'continue') {
            this.increment('MOVES', 1);
        }
        return outcome;
    }

    /**
     * Read, resolve and perform commands until the game ends or input runs out.
     */
    async run(input: InputSource, resolver: CommandResolver): Promise<TerminationReason | 'quit'> {
        while (this._ended === null) {
            const line = await input.readLine(PROMPT);
            if (line === null) {
                logger.log('[Game] Input exhausted');
                return 'quit';
            }

            const command = resolver(line, this);
            if (!command) {
                this.tell("I don't understand that.", CR);
                continue;
            }

            const outcome = this.runTurn(command);
            if (outcome.status === 'ended') {
                return outcome.reason;
            }
        }
        return this._ended ?? 'quit';
    }
}
