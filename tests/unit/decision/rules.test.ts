import { describe, it, expect } from 'vitest';
import { RuleEvaluator } from '../../../src/decision/rules.js';
import { makeConfig, makeSnapshot, hostile } from '../../helpers/fixtures.js';

describe('RuleEvaluator', () => {
  const config = makeConfig();
  const rules = new RuleEvaluator(config.rules, config.reflex);

  it('should fall to idle with a rest duration when nothing applies', () => {
    const snapshot = makeSnapshot();
    expect(rules.hasTacticalRule(snapshot)).toBe(false);
    expect(rules.decide(snapshot)).toEqual({
      kind: 'idle',
      parameters: { duration: 5 },
      confidence: 0.6,
      rationale: 'No tactical action required',
    });
  });

  it('should heal between the critical and comfort thresholds', () => {
    const snapshot = makeSnapshot({ agent: { health: 50 } });
    expect(rules.tacticalRule(snapshot)).toBe('heal');
    expect(rules.decide(snapshot).kind).toBe('useItem');
  });

  it('should not heal at critical health, which belongs to the reflex layer', () => {
    expect(rules.tacticalRule(makeSnapshot({ agent: { health: 20 } }))).toBeNull();
  });

  it('should prefer an aggressive target over a closer passive one', () => {
    const snapshot = makeSnapshot({
      entities: [hostile('passive', 2, false), hostile('angry', 9, true)],
    });
    expect(rules.findTarget(snapshot)?.id).toBe('angry');
  });

  it('should ignore entities beyond attack distance and non-hostiles', () => {
    const snapshot = makeSnapshot({
      entities: [
        hostile('far', 16),
        { id: 'npc', name: 'Kafra', disposition: 'friendly', distance: 1, aggressive: false },
      ],
    });
    expect(rules.findTarget(snapshot)).toBeNull();
    expect(rules.hasTacticalRule(snapshot)).toBe(false);
  });

  it('should use the class skill when stamina allows', () => {
    const action = rules.decide(makeSnapshot({ entities: [hostile('m1', 4)] }));
    expect(action).toEqual({
      kind: 'useSkill',
      parameters: { skill: 'Bash', target: 'm1' },
      confidence: 0.8,
      rationale: 'Skill attack on Poring m1',
    });
  });

  it('should fall back to a basic attack for classes without a skill', () => {
    const action = rules.decide(makeSnapshot({ agent: { jobClass: 'Novice' }, entities: [hostile('m1', 4)] }));
    expect(action.kind).toBe('attack');
    expect(action.parameters).toEqual({ target: 'm1' });
  });

  it('should reposition when surrounded but too hurt to fight', () => {
    const config2 = makeConfig({ rules: { heal_below: 0.3 } });
    const cautious = new RuleEvaluator(config2.rules, config2.reflex);
    const snapshot = makeSnapshot({
      agent: { health: 35 },
      entities: [hostile('a', 3), hostile('b', 4), hostile('c', 5)],
    });

    expect(cautious.tacticalRule(snapshot)).toBe('reposition');
    expect(cautious.decide(snapshot).parameters).toEqual({ direction: 'away' });
  });
});
