import { describe, it, expect } from 'vitest';
import { extractFinalAnswer, parseAction, parseModelOutput } from '../parser.js';

describe('ReAct output parser', () => {
  describe('actions', () => {
    it('should parse a single quoted argument', () => {
      expect(parseModelOutput('ACTION: get_spending("housing")')).toEqual({
        kind: 'action',
        tool: 'get_spending',
        args: ['housing'],
      });
    });

    it('should match the marker and tool name case-insensitively', () => {
      expect(parseAction("action: Get_Spending('Food')")).toEqual({
        tool: 'get_spending',
        args: ['Food'],
      });
    });

    it('should trim whitespace around each argument', () => {
      expect(parseAction(`ACTION: compare_spending( "housing" ,  'food' )`)).toEqual({
        tool: 'compare_spending',
        args: ['housing', 'food'],
      });
    });

    it('should treat empty parentheses as a call without arguments', () => {
      expect(parseAction('ACTION: get_total_spending()')).toEqual({
        tool: 'get_total_spending',
        args: [],
      });
    });

    it('should find the action line among thoughts', () => {
      const output = 'THOUGHT: I need the food budget.\nACTION: get_spending("food")\n[wait for observation]';
      expect(parseAction(output)).toEqual({ tool: 'get_spending', args: ['food'] });
    });

    it('should remove only one layer of matching quotes', () => {
      expect(parseAction('ACTION: get_spending(""housing"")')?.args).toEqual(['"housing"']);
      expect(parseAction('ACTION: get_spending(housing)')?.args).toEqual(['housing']);
    });

    it('should keep a closing parenthesis inside a quoted argument', () => {
      expect(parseModelOutput('ACTION: get_spending("food :)")')).toEqual({
        kind: 'action',
        tool: 'get_spending',
        args: ['food :)'],
      });
      expect(parseAction(`ACTION: compare_spending('(housing)', "food")`)?.args).toEqual(['(housing)', 'food']);
    });

    it('should keep an apostrophe inside an unquoted argument', () => {
      expect(parseAction("ACTION: get_spending(children's clothing)")?.args).toEqual(["children's clothing"]);
    });

    it('should keep balanced nested parentheses inside an argument', () => {
      expect(parseAction('ACTION: get_spending(f(x)) and then wait')?.args).toEqual(['f(x)']);
    });

    it('should not match the marker inside a longer word', () => {
      expect(parseModelOutput('TRANSACTION: get_spending("food")')).toEqual({ kind: 'none' });
    });

    it.each([
      ['unbalanced parentheses', 'ACTION: get_spending("housing"'],
      ['empty middle argument', 'ACTION: compare_spending("housing",,"food")'],
      ['trailing comma', 'ACTION: compare_spending("housing",)'],
      ['leading comma', 'ACTION: compare_spending(,"food")'],
      ['missing parentheses', 'ACTION: get_spending'],
      ['missing tool name', 'ACTION: ("housing")'],
      ['close paren on a later line', 'ACTION: get_spending("housing"\n)'],
      ['quote left open past the close paren', 'ACTION: get_spending("food :)'],
      ['mismatched quotes', `ACTION: get_spending("housing')`],
      ['closing quote without an opening one', "ACTION: get_spending(housing')"],
      ['comma inside a quoted argument', 'ACTION: get_spending("housing, food")'],
    ])('should return no action for %s', (_label, output) => {
      expect(parseAction(output)).toBeNull();
      expect(parseModelOutput(output)).toEqual({ kind: 'none' });
    });

    it('should only consider the first action line', () => {
      const output = 'ACTION: get_spending(\nACTION: get_spending("food")';
      expect(parseModelOutput(output)).toEqual({ kind: 'none' });
    });

    it('should return none for plain prose', () => {
      expect(parseModelOutput('I think housing is the biggest expense.')).toEqual({ kind: 'none' });
    });
  });

  describe('final answers', () => {
    it('should extract the trimmed answer text', () => {
      expect(parseModelOutput('FINAL ANSWER: Housing costs more.')).toEqual({
        kind: 'final',
        answer: 'Housing costs more.',
      });
    });

    it('should keep multi-line answers and trim the ends', () => {
      const output = 'THOUGHT: I have the data.\nfinal answer:\n  Housing: 11,332 NOK.\nFood: 4,342 NOK.  \n';
      expect(extractFinalAnswer(output)).toBe('Housing: 11,332 NOK.\nFood: 4,342 NOK.');
    });

    it('should accept the marker without a colon', () => {
      expect(extractFinalAnswer('FINAL ANSWER Housing costs more.')).toBe('Housing costs more.');
    });

    it('should yield an empty answer when nothing follows the marker', () => {
      expect(parseModelOutput('FINAL ANSWER:   ')).toEqual({ kind: 'final', answer: '' });
    });

    it('should return null without a marker', () => {
      expect(extractFinalAnswer('ACTION: get_spending("food")')).toBeNull();
    });

    it('should prefer termination over an action in the same output', () => {
      const output = 'ACTION: get_spending("food")\nFINAL ANSWER: Food is 4,342 NOK per month.';
      expect(parseModelOutput(output)).toEqual({
        kind: 'final',
        answer: 'Food is 4,342 NOK per month.',
      });
    });
  });
});
