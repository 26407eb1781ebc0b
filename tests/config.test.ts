import { expect } from 'chai';
import { describe, it } from 'mocha';
import { DEFAULT_CONFIG, DEFAULT_WEIGHTS, applyCliOptions, loadConfigFromEnv } from '../src/config';

describe('config', () => {
    describe('loadConfigFromEnv', () => {
        it('should use the defaults for an empty environment', () => {
            const config = loadConfigFromEnv({});

            expect(config.memoryFile).to.equal('curio_memory.json');
            expect(config.debug).to.be.false;
            expect(config.useGameEngine).to.be.true;
            expect(config.seed).to.be.undefined;
            expect(config.phrasesConfig).to.be.undefined;
            expect(config.weights).to.deep.equal(DEFAULT_WEIGHTS);
        });

        it('should read the CURIO_ variables', () => {
            const config = loadConfigFromEnv({
                CURIO_MEMORY_FILE: 'mem.json',
                CURIO_PHRASES_CONFIG: 'phrases.json',
                CURIO_DEBUG: 'yes',
                CURIO_SEED: '42',
                CURIO_GAME_ENGINE: 'false',
                CURIO_STORE_TIMEOUT_MS: '250',
                CURIO_WEIGHT_FLOW: '0.5',
            });

            expect(config.memoryFile).to.equal('mem.json');
            expect(config.phrasesConfig).to.equal('phrases.json');
            expect(config.debug).to.be.true;
            expect(config.seed).to.equal(42);
            expect(config.useGameEngine).to.be.false;
            expect(config.storeTimeoutMs).to.equal(250);
            expect(config.weights).to.deep.equal({ happiness: 1.5, knowledge: 2.0, flow: 0.5 });
        });

        it('should reject a value that is not a number', () => {
            expect(() => loadConfigFromEnv({ CURIO_SEED: 'abc' })).to.throw('Invalid numeric value for CURIO_SEED: "abc"');
        });
    });

    describe('applyCliOptions', () => {
        it('should let given options win over the environment', () => {
            const config = applyCliOptions({ ...DEFAULT_CONFIG, seed: 1 }, { memoryFile: 'other.json', seed: 7, debug: true });

            expect(config.memoryFile).to.equal('other.json');
            expect(config.seed).to.equal(7);
            expect(config.debug).to.be.true;
        });

        it('should keep the environment for options that are not given', () => {
            const config = applyCliOptions({ ...DEFAULT_CONFIG, memoryFile: 'env.json', useGameEngine: false }, { game: true });

            expect(config.memoryFile).to.equal('env.json');
            expect(config.useGameEngine).to.be.false;
        });

        it('should turn the game engine off for --no-game', () => {
            expect(applyCliOptions(DEFAULT_CONFIG, { game: false }).useGameEngine).to.be.false;
        });
    });
});
