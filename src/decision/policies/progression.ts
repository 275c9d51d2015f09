import { type CandidateAction, type StateSnapshot, createAction } from '../../types/index.js';
import type { Policy } from '../policy-bank.js';

const FIRST_JOBS: ReadonlySet<string> = new Set([
  'Swordman',
  'Mage',
  'Archer',
  'Thief',
  'Merchant',
  'Acolyte',
]);

const FIRST_JOB_LEVEL = 10;
const SECOND_JOB_LEVEL = 50;

export class ProgressionPolicy implements Policy {
  readonly name = 'progression';

  applicable(snapshot: StateSnapshot): boolean {
    return jobChangeDue(snapshot) || snapshot.freePoints.stat > 0 || snapshot.freePoints.skill > 0;
  }

  decide(snapshot: StateSnapshot): CandidateAction {
    if (jobChangeDue(snapshot)) {
      return createAction('changeJob', `Job change milestone reached at level ${snapshot.agent.level}`, 0.9, {
        targetJob: 'auto',
      });
    }
    if (snapshot.freePoints.stat > 0) {
      return createAction('allocateStats', 'Unspent stat points', 0.8, { points: snapshot.freePoints.stat });
    }
    if (snapshot.freePoints.skill > 0) {
      return createAction('allocateSkills', 'Unspent skill points', 0.8, { points: snapshot.freePoints.skill });
    }
    return createAction('idle', 'Progression on track', 0.1);
  }
}

function jobChangeDue(snapshot: StateSnapshot): boolean {
  const { level, jobClass } = snapshot.agent;
  if (jobClass === 'Novice') return level >= FIRST_JOB_LEVEL;
  return FIRST_JOBS.has(jobClass) && level >= SECOND_JOB_LEVEL;
}
