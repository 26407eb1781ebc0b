import { expect } from 'chai';
import sinon from 'sinon';
import { describe, it, beforeEach, afterEach } from 'mocha';
import inquirer from 'inquirer'; // Import inquirer for mocking
import * as shell from '../src/cli/shell';
import { ConversationEngine } from '../src/conversation/ConversationEngine';
import { TransientStoreFailure } from '../src/errors';
import { ConceptStore } from '../src/memory/ConceptStore';
import { PhraseService } from '../src/services/PhraseService';

describe('Shell Module', () => {
  let consoleLogStub: sinon.SinonStub;
  let store: ConceptStore;
  let engine: ConversationEngine;

  beforeEach(() => {
    // Stub console methods before each test
    consoleLogStub = sinon.stub(console, 'log');
    sinon.stub(console, 'debug');

    store = ConceptStore.fromState();
    engine = new ConversationEngine(store, new PhraseService(), { random: { next: () => 0 } });
  });

  afterEach(() => {
    sinon.restore(); // Restore all stubs/spies/mocks after each test
  });

  const inputs = (...lines: string[]) => {
    const queue = [...lines];
    return async () => queue.shift() ?? 'quit';
  };

  describe('getUserInput', () => {
    it('should return the trimmed input from inquirer prompt', async () => {
      const promptStub = sinon.stub(inquirer, 'prompt').resolves({ utterance: '  A dog is an animal  ' });

      const result = await shell.getUserInput();

      expect(result).to.equal('A dog is an animal');
      expect(promptStub.calledOnce).to.be.true;
      // Check if the correct question was asked
      expect(promptStub.firstCall.args[0]).to.deep.equal([{ type: 'input', name: 'utterance', message: 'curio> ' }]);
    });
  });

  describe('saveAfterTurn', () => {
    it('should return true when the store was saved', async () => {
      sinon.stub(store, 'saveMemory').resolves();

      expect(await shell.saveAfterTurn(store)).to.be.true;
    });

    it('should report a failed save and carry on', async () => {
      sinon.stub(store, 'saveMemory').rejects(new TransientStoreFailure('disk gone'));

      expect(await shell.saveAfterTurn(store)).to.be.false;
      expect(consoleLogStub.calledWith('(Could not save what I learned: disk gone)')).to.be.true;
    });

    it('should rethrow other errors', async () => {
      sinon.stub(store, 'saveMemory').rejects(new Error('unexpected'));

      let error: unknown;
      try {
        await shell.saveAfterTurn(store);
      } catch (e) {
        error = e;
      }
      expect(error instanceof Error && error.message).to.equal('unexpected');
    });
  });

  describe('startShell', () => {
    it('should print each reply and stop on quit', async () => {
      const saveStub = sinon.stub(store, 'saveMemory').resolves();

      await shell.startShell(engine, store, inputs('A dog is an animal', 'quit'));

      expect(consoleLogStub.calledWith('Curio: I see, dog is animal. What can dog do?')).to.be.true;
      expect(consoleLogStub.calledWith('Curio: Goodbye! Keep teaching me new things!')).to.be.true;
      expect(saveStub.calledTwice).to.be.true;
    });

    it('should keep the conversation going when a save fails', async () => {
      sinon.stub(store, 'saveMemory')
        .onFirstCall().rejects(new TransientStoreFailure('disk gone'))
        .onSecondCall().resolves();

      await shell.startShell(engine, store, inputs('A dog is an animal', 'bark', 'quit'));

      expect(consoleLogStub.calledWith('Curio: Got it, dog can bark.')).to.be.true;
      expect(store.load('dog')?.getAttribute('can_do')).to.deep.equal(['bark']);
    });
  });
});
