import { describe, expect, it } from 'vitest';
import { isStopRequest, parseCommand, tokenize } from '../commands.js';

describe('parseCommand', () => {
  it.each([
    ['Who is in front of me?', { kind: 'identify' }],
    ['can you recognize her', { kind: 'identify' }],
    ['What do you see', { kind: 'objects' }],
    ["who's there", { kind: 'identify' }],
    ["what's that", { kind: 'objects' }],
    ['read the label', { kind: 'read', mode: 'label' }],
    ['please read this', { kind: 'read', mode: 'document' }],
    ['read continuously', { kind: 'scan', mode: 'document' }],
    ['scan the sign', { kind: 'scan', mode: 'sign' }],
    ['watch my gestures', { kind: 'gestures' }],
    ['any movement', { kind: 'gestures' }],
    ['describe my surroundings', { kind: 'describe' }],
    ['help', { kind: 'help' }],
    ['exit', { kind: 'exit' }]
  ])('maps "%s"', (utterance, expected) => {
    expect(parseCommand(utterance)).toEqual(expected);
  });

  it('lets the earlier rule win when several match', () => {
    expect(parseCommand('what does the sign read')).toEqual({ kind: 'objects' });
    expect(parseCommand('who can help')).toEqual({ kind: 'identify' });
  });

  it('matches whole words only', () => {
    expect(parseCommand('seesaw')).toBeNull();
    expect(parseCommand('somewhat helpful')).toBeNull();
  });

  it('ignores unrelated and empty input', () => {
    expect(parseCommand('good morning')).toBeNull();
    expect(parseCommand('')).toBeNull();
  });
});

describe('tokenize', () => {
  it('splits contractions at the apostrophe', () => {
    expect(tokenize("What's in front of me?")).toEqual(['what', 's', 'in', 'front', 'of', 'me']);
  });
});

describe('isStopRequest', () => {
  it('looks for stop or exit as words', () => {
    expect(isStopRequest('please stop')).toBe(true);
    expect(isStopRequest('exit now')).toBe(true);
    expect(isStopRequest('stopwatch')).toBe(false);
  });
});
