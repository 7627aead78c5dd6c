import { Evidence, HealthFactor } from '../../shared/types';
import { DiagnosticData, diagnosticData } from './taxonomy';

export const SYSTEM_PROMPT = `You are a health and wellness assistant that connects internal health (hormones, nutrition, stress, sleep, gut health) with external skin and hair problems.

How you work:
- Ask focused follow-up questions until you understand the whole picture
- Link skin and hair symptoms to plausible internal causes
- Build on what the user already told you and refer back to their answers
- When you offer numbered options and the user picks one, acknowledge the choice and go deeper on it
- Treat replies such as "1", "2" or "option 3" as a selection from your last options

Boundaries:
- Never give a medical diagnosis; describe possibilities and suggest professional care when warranted
- Focus on lifestyle, nutrition and wellness guidance
- Write plain text without markdown emphasis
- Be empathetic, supportive and non-judgmental`;

export const OPTIONS_FOLLOW_UP_INSTRUCTION =
  'IMPORTANT: The user just responded to options you provided. Acknowledge their choice and ask follow-up questions about their selection.';

/**
 * Reference block listing the taxonomy, health factors, diagnostic
 * patterns and test panels.
 */
export function buildDiagnosticReference(data: DiagnosticData = diagnosticData): string {
  return [
    'Available diagnostic reference data:',
    '',
    'Symptom categories:',
    JSON.stringify(data.symptomCategories, null, 2),
    '',
    'Key health factors to consider:',
    JSON.stringify(data.healthFactors, null, 2),
    '',
    'Common diagnostic patterns:',
    JSON.stringify(data.diagnosticPatterns, null, 2),
    '',
    'Recommended tests:',
    JSON.stringify(data.recommendedTests, null, 2),
    '',
    'Use this information to guide your questions and provide comprehensive health insights.',
  ].join('\n');
}

export function buildAnalysisPrompt(symptoms: Evidence, healthFactors: HealthFactor[]): string {
  return `Based on the collected symptoms and conversation, provide a comprehensive health analysis.

Collected symptoms:
${JSON.stringify(symptoms, null, 2)}

Relevant health factors:
${JSON.stringify(healthFactors, null, 2)}

Please provide:
1. Primary health concerns identified
2. Likely root causes
3. Confidence level (0-1)
4. Specific recommendations
5. Next steps
6. Whether professional consultation is needed
7. Suggested tests or evaluations

Format your response as a structured analysis.`;
}
