import { test } from 'node:test';
import assert from 'node:assert/strict';

import { composeStory } from '../../src/insights/story.js';
import { rally } from '../helpers/matches.js';

test('never trailing is a wire-to-wire victory', () => {
  assert.equal(composeStory(rally('AABAA'), 'WIN', 0).headline, 'Wire-to-Wire Victory');
});

test('a deficit of five or more makes a comeback story', () => {
  assert.deepEqual(composeStory(rally('BBBBBAAAAAAA'), 'WIN', 0), {
    headline: 'Epic Comeback',
    description: 'You were down 5 points but fought back to claim victory.',
  });
  assert.deepEqual(composeStory(rally('AAAAABBBBBBB'), 'LOSS', 0), {
    headline: "Couldn't Hold On",
    description: 'You had a 5-point lead but your opponent mounted a comeback.',
  });
});

test('a large lead held most of the match is dominant', () => {
  assert.deepEqual(composeStory(rally('BAAAAAAAAAA'), 'WIN', 0), {
    headline: 'Dominant Performance',
    description: 'You controlled the game with a commanding 9-point lead.',
  });
});

test('close matches read as nail-biters', () => {
  assert.equal(composeStory(rally('BAABAB'), 'WIN', 0).headline, 'Nail-Biter Victory');
  assert.equal(composeStory(rally('ABBAB'), 'LOSS', 0).headline, 'So Close');
});

test('lead changes decide between a battle and a plain result', () => {
  assert.deepEqual(composeStory(rally('BBBBAAAAAAAA'), 'WIN', 5), {
    headline: 'Battle of Wills',
    description: 'The lead changed 5 times, but you had the final say.',
  });
  assert.equal(composeStory(rally('BBBBAAAAAAAA'), 'WIN', 0).headline, 'Nice Win');
  assert.equal(composeStory(rally('AAAABBBBBBBB'), 'LOSS', 0).headline, 'Better Luck Next Time');
});
