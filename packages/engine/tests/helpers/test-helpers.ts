import { Game, type GameSetup } from '@/game';
import { BufferSink } from '@/output';
import type { InputSource, ResolvedCommand } from '@/types';

export interface TestGame {
    game: Game;
    sink: BufferSink;
}

/**
 * Create a game with a fixed random seed writing into a buffer.
 */
export function createTestGame(setup?: GameSetup, rngSeed: number = 12345): TestGame {
    const sink = new BufferSink();
    const game = new Game({
        sink,
        setup,
        config: { rngSeed, logLevel: 'silent' }
    });
    return { game, sink };
}

/**
 * Input source that replays scripted lines, then reports end of input.
 */
export function scriptedInput(lines: string[]): InputSource & { prompts: string[] } {
    const queue = [...lines];
    const prompts: string[] = [];
    return {
        prompts,
        readLine(prompt: string): Promise<string | null> {
            prompts.push(prompt);
            return Promise.resolve(queue.shift() ?? null);
        }
    };
}

/**
 * Resolver for tests: "verb", "verb direct" or "verb direct indirect",
 * words taken as-is.
 */
export function wordResolver(line: string): ResolvedCommand | null {
    const words = line.trim().split(/\s+/).filter(word => word.length > 0);
    if (words.length === 0) return null;
    const [verb, direct, indirect] = words;
    return { verb, direct: direct ?? null, indirect: indirect ?? null };
}
