import {
  parseActionTokens,
  summarizePlan,
  translatePlan,
} from '../../src/planning/application/TraceTranslator';

describe('translatePlan', () => {
  it('explains move actions and skips comments and other actions', () => {
    expect(translatePlan('(move r1 room1 room3)\n; comment\n(noop)')).toBe(
      'Robot r1 moves from room1 to room3.',
    );
  });

  it('returns an empty string for empty input', () => {
    expect(translatePlan('')).toBe('');
  });

  it('keeps the order of the source lines', () => {
    const trace = [
      '(move r1 room1 room2)',
      '(pick r1 box1 room2)',
      '(move r1 room2 room3)',
      '; cost = 3 (unit cost)',
    ].join('\n');

    expect(translatePlan(trace)).toBe(
      'Robot r1 moves from room1 to room2.\nRobot r1 moves from room2 to room3.',
    );
  });

  it('skips short and malformed move lines', () => {
    const trace = ['(move r1 room1)', 'move r1 room1 room2', ')move r1 a b(', '   '].join('\n');
    expect(translatePlan(trace)).toBe('');
  });

  it('tolerates surrounding whitespace and CRLF line endings', () => {
    expect(translatePlan('  (move   r2 hall   kitchen)  \r\n')).toBe(
      'Robot r2 moves from hall to kitchen.',
    );
  });
});

describe('parseActionTokens', () => {
  it('returns null for comments and lines without parentheses', () => {
    expect(parseActionTokens('; cost = 1')).toBeNull();
    expect(parseActionTokens('move r1 a b')).toBeNull();
  });

  it('splits the first parenthesised group', () => {
    expect(parseActionTokens('(move r1 a b) (extra)')).toEqual(['move', 'r1', 'a', 'b']);
  });
});

describe('summarizePlan', () => {
  it('counts every action line', () => {
    expect(summarizePlan('(move r1 a b)\n(noop)\n; cost = 2 (unit cost)')).toEqual({
      steps: 2,
      reachedGoal: true,
    });
  });

  it('reports no progress for an empty trace', () => {
    expect(summarizePlan('')).toEqual({ steps: 0, reachedGoal: false });
  });
});
