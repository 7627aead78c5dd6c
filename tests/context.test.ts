/**
 * Tests for the context synthesizer and completion payload
 */

import {
  HISTORY_WINDOW,
  analyzeContext,
  buildCompletionPayload,
  classifyExchange,
  lengthBucket,
  renderContext,
} from '../src/domain/assessment/context';
import {
  OPTIONS_FOLLOW_UP_INSTRUCTION,
  SYSTEM_PROMPT,
  buildDiagnosticReference,
} from '../src/domain/assessment/prompts';
import { extractSymptoms } from '../src/domain/assessment/symptoms';
import { CompletionMessage } from '../src/shared/types';

const OPTIONS_QUESTION = 'Which one fits best?\n1. Dry skin\n2. Oily skin\n3: Combination\n4. Not sure';

describe('classifyExchange', () => {
  it('should spot numbered options', () => {
    expect(classifyExchange(OPTIONS_QUESTION)).toBe('responding_to_options');
  });

  it('should spot questions', () => {
    expect(classifyExchange('How long have you had it?')).toBe('responding_to_question');
    expect(classifyExchange('On a scale of 1-5, how bad is it?')).toBe('responding_to_question');
  });

  it('should default to additional information', () => {
    expect(classifyExchange('Thanks for sharing that with me')).toBe('providing_information');
  });
});

describe('lengthBucket', () => {
  it.each([
    [0, 'early'],
    [2, 'early'],
    [3, 'mid'],
    [6, 'mid'],
    [7, 'advanced'],
  ])('%i messages -> %s', (count, expected) => {
    expect(lengthBucket(count)).toBe(expected);
  });
});

describe('renderContext', () => {
  it('should describe an options exchange in order', () => {
    const messages: CompletionMessage[] = [
      { role: 'assistant', content: OPTIONS_QUESTION },
      { role: 'user', content: 'option 2' },
    ];

    const context = renderContext(
      analyzeContext({ stage: 'gathering_info', evidence: extractSymptoms('acne'), messages })
    );

    expect(context).toBe(
      'Current Assessment Stage: gathering_info' +
        ' | Identified Symptoms: acne' +
        ' | Previous Context: User is responding to specific options/choices you provided' +
        ' | Options provided: 1. Dry skin | 2. Oily skin | 3: Combination' +
        ' | User Response Type: Appears to be selecting from provided options' +
        ' | Conversation Status: Early stage - focus on gathering basic information'
    );
  });

  it('should describe a question exchange', () => {
    const messages: CompletionMessage[] = [
      { role: 'user', content: 'My skin feels rough' },
      { role: 'assistant', content: 'How long have you had it?' },
      { role: 'user', content: 'About a year' },
    ];

    expect(renderContext(analyzeContext({ stage: 'gathering_info', evidence: {}, messages }))).toBe(
      'Current Assessment Stage: gathering_info' +
        ' | Previous Context: User is responding to questions you asked' +
        ' | Conversation Status: Mid-stage - dive deeper into specific symptoms'
    );
  });

  it('should skip the exchange for a first message', () => {
    const messages: CompletionMessage[] = [{ role: 'user', content: 'Hello' }];

    expect(renderContext(analyzeContext({ stage: 'initial', evidence: {}, messages }))).toBe(
      'Current Assessment Stage: initial | Conversation Status: Early stage - focus on gathering basic information'
    );
  });

  it('should skip the exchange when no assistant message exists yet', () => {
    const snapshot = analyzeContext({
      stage: 'gathering_info',
      evidence: {},
      messages: [
        { role: 'user', content: 'Hello' },
        { role: 'user', content: 'Anyone there?' },
      ],
    });

    expect(snapshot.exchange).toBeNull();
  });
});

describe('buildCompletionPayload', () => {
  it('should add the follow-up instruction after options', () => {
    const payload = buildCompletionPayload({
      stage: 'gathering_info',
      evidence: {},
      messages: [
        { role: 'assistant', content: OPTIONS_QUESTION },
        { role: 'user', content: '2' },
      ],
    });

    expect(payload.system.startsWith(SYSTEM_PROMPT)).toBe(true);
    expect(payload.system).toContain(`CONVERSATION CONTEXT: ${payload.context}`);
    expect(payload.system.endsWith(OPTIONS_FOLLOW_UP_INSTRUCTION)).toBe(true);
  });

  it('should leave the instruction out otherwise', () => {
    const payload = buildCompletionPayload({
      stage: 'initial',
      evidence: {},
      messages: [{ role: 'user', content: 'Hello' }],
    });

    expect(payload.system).not.toContain(OPTIONS_FOLLOW_UP_INSTRUCTION);
    expect(payload.system).toContain('Available diagnostic reference data:');
  });

  it('should keep only the most recent messages', () => {
    const messages: CompletionMessage[] = Array.from({ length: 14 }, (_, i): CompletionMessage => ({
      role: i % 2 === 0 ? 'user' : 'assistant',
      content: `message ${i}`,
    }));

    const payload = buildCompletionPayload({ stage: 'gathering_info', evidence: {}, messages });

    expect(HISTORY_WINDOW).toBe(10);
    expect(payload.messages).toHaveLength(10);
    expect(payload.messages[0]?.content).toBe('message 4');
    expect(payload.messages[9]?.content).toBe('message 13');
    expect(payload.context).toContain('Conversation Status: Advanced stage - ready for analysis or recommendations');
  });
});

describe('buildDiagnosticReference', () => {
  const reference = buildDiagnosticReference();

  it('should list the diagnostic patterns with causes and thresholds', () => {
    expect(reference).toContain('Common diagnostic patterns:');
    expect(reference).toContain('"hormonal_acne": {');
    expect(reference).toContain('"stress_hair_loss": {');
    expect(reference).toContain('"telogen_effluvium"');
    expect(reference).toContain('"confidenceThreshold": 0.6');
  });

  it('should carry the full category entries', () => {
    expect(reference).toContain('"label": "Hair Conditions"');
    expect(reference).toContain('"severityLevels": [');
    expect(reference).toContain('"associatedFactors": [');
  });

  it('should keep the sections in order', () => {
    const order = [
      'Symptom categories:',
      'Key health factors to consider:',
      'Common diagnostic patterns:',
      'Recommended tests:',
    ].map((heading) => reference.indexOf(heading));

    expect(order.every((position) => position >= 0)).toBe(true);
    expect([...order].sort((a, b) => a - b)).toEqual(order);
  });
});
