import { describe, it, expect } from 'vitest';
import { createTestGame } from './helpers/test-helpers';

describe('Dispatch predicates', () => {
    const setup = createTestGame(game => {
        game.registerVerb('TAKE', 'V-TAKE');
        game.registerVerb('GET', 'V-TAKE');
        game.registerVerb('DROP', 'V-DROP');
        game.define('KITCHEN');
        game.define('CELLAR');
        game.define('KNIFE', { parent: 'KITCHEN' });
        game.define('TABLE', { parent: 'KITCHEN' });
    });

    it('should match a verb only when PRSA holds its registered tag', () => {
        const { game } = setup;

        game.setg('PRSA', 'V-TAKE');
        expect(game.verbMatches('TAKE')).toBe(true);
        expect(game.verbMatches('GET')).toBe(true);

        game.setg('PRSA', 'V-DROP');
        expect(game.verbMatches('TAKE')).toBe(false);
        expect(game.verbMatches('TAKE', 'DROP')).toBe(true);

        game.setg('PRSA', 'TAKE');
        expect(game.verbMatches('TAKE')).toBe(false);
    });

    it('should fall back to the bare name for unregistered verbs', () => {
        const { game } = setup;
        game.setg('PRSA', 'XYZZY');
        expect(game.verbMatches('XYZZY')).toBe(true);
    });

    it('should be false with no verbs to match', () => {
        const { game } = setup;
        game.setg('PRSA', 'V-TAKE');
        expect(game.verbMatches()).toBe(false);
    });

    it('should test the direct and indirect objects by identity', () => {
        const { game } = setup;
        game.setg('PRSO', 'KNIFE');
        game.setg('PRSI', 'TABLE');

        expect(game.directObjectIs('KNIFE')).toBe(true);
        expect(game.directObjectIs('TABLE', 'KNIFE')).toBe(true);
        expect(game.directObjectIs('TABLE')).toBe(false);
        expect(game.indirectObjectIs('TABLE')).toBe(true);
        expect(game.indirectObjectIs('KNIFE')).toBe(false);
    });

    it('should never match an empty pointer', () => {
        const { game } = setup;
        game.setg('PRSI', null);
        expect(game.indirectObjectIs('TABLE')).toBe(false);
    });

    it('should test the current room', () => {
        const { game } = setup;
        game.setg('HERE', 'CELLAR');
        expect(game.roomIs('KITCHEN', 'CELLAR')).toBe(true);
        expect(game.roomIs('KITCHEN')).toBe(false);
    });

    it('should leave the environment untouched', () => {
        const { game } = setup;
        game.setg('PRSA', 'V-TAKE');
        game.setg('PRSO', 'KNIFE');
        const before = game.env.names().map(name => [name, game.getg(name)]);

        game.verbMatches('TAKE');
        game.directObjectIs('KNIFE');
        game.roomIs('KITCHEN');

        expect(game.env.names().map(name => [name, game.getg(name)])).toEqual(before);
    });
});
