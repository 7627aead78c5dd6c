import { AssessmentStage } from '../../shared/types';

export const DIAGNOSTIC_MIN_ASSISTANT_MESSAGES = 2;
export const DIAGNOSTIC_MIN_SYMPTOMS = 3;

export interface StageInputs {
  assistantMessageCount: number;
  symptomCount: number;
}

/**
 * Stage from current evidence, recomputed from scratch on every turn.
 * There is no ratchet: shrinking inputs give an earlier stage.
 */
export function computeStage(inputs: StageInputs): Exclude<AssessmentStage, 'completed'> {
  const { assistantMessageCount, symptomCount } = inputs;

  if (
    assistantMessageCount >= DIAGNOSTIC_MIN_ASSISTANT_MESSAGES &&
    symptomCount >= DIAGNOSTIC_MIN_SYMPTOMS
  ) {
    return 'diagnostic_ready';
  }

  if (symptomCount >= 1 || assistantMessageCount >= 1) {
    return 'gathering_info';
  }

  return 'initial';
}

export function isTerminalStage(stage: AssessmentStage): boolean {
  return stage === 'completed';
}

export function needsDiagnosis(stage: AssessmentStage): boolean {
  return stage === 'diagnostic_ready';
}
