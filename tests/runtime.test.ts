import { expect } from 'chai';
import sinon from 'sinon';
import * as path from 'path';
import { describe, it, afterEach } from 'mocha';
import { DEFAULT_CONFIG } from '../src/config';
import { createRuntime, formatGapReport } from '../src/cli/runtime';
import { ConceptStore } from '../src/memory/ConceptStore';

describe('runtime', () => {
    afterEach(() => {
        sinon.restore();
    });

    describe('createRuntime', () => {
        it('should load the memory file named in the configuration', async () => {
            const readFile = sinon.stub().resolves(JSON.stringify({
                concepts: [{ identity: 'dog', kind: 'Noun' }],
                attributes: [{ parentIdentity: 'dog', attributeName: 'is', attributeValue: 'animal' }],
            }));

            const runtime = await createRuntime({ ...DEFAULT_CONFIG, memoryFile: 'test-memory.json' }, { storeOptions: { readFile } });

            expect(readFile.calledOnceWith(path.resolve('test-memory.json'))).to.be.true;
            expect(runtime.store.load('dog')?.getAttribute('is')).to.deep.equal(['animal']);
        });

        it('should apply phrase overrides before the first turn', async () => {
            const readFile = sinon.stub().rejects({ code: 'ENOENT' });
            const readFileFn = sinon.stub().resolves(JSON.stringify({ system: { goodbye: 'See you!' } }));
            const resolvePathFn = sinon.stub().returns('/abs/phrases.json');

            const runtime = await createRuntime(
                { ...DEFAULT_CONFIG, phrasesConfig: 'phrases.json' },
                { storeOptions: { readFile }, phraseDeps: { readFileFn, resolvePathFn } },
            );

            expect(runtime.engine.processTurn('quit').message).to.equal('See you!');
            expect(readFileFn.calledOnceWith('/abs/phrases.json', 'utf-8')).to.be.true;
        });

        it('should start the logger with the configured debug flag', async () => {
            const readFile = sinon.stub().rejects({ code: 'ENOENT' });
            const debugStub = sinon.stub(console, 'debug');

            const runtime = await createRuntime({ ...DEFAULT_CONFIG, debug: true }, { storeOptions: { readFile } });

            expect(runtime.logger.debug).to.be.true;
            expect(runtime.engine.session.logger).to.equal(runtime.logger);
            expect(debugStub.calledWith(`[debug] ConceptStore: loading ${path.resolve(DEFAULT_CONFIG.memoryFile)}`)).to.be.true;
        });
    });

    describe('formatGapReport', () => {
        const build = () => {
            const store = ConceptStore.fromState();
            const dog = store.createOrGet('dog', 'Noun');
            dog.learn('is', 'animal');
            store.save(dog);
            store.createOrGet('cat', 'Noun');
            return store;
        };

        it('should list incomplete concepts, most incomplete first', () => {
            expect(formatGapReport(build())).to.deep.equal([
                'cat (Noun): 0% complete, missing is, can_do, can_have, feels_like, used_for, part_of, can_be',
                'dog (Noun): 14% complete, missing can_do, can_have, feels_like, used_for, part_of, can_be',
            ]);
        });

        it('should stop at the limit', () => {
            expect(formatGapReport(build(), 1)).to.have.length(1);
        });
    });
});
