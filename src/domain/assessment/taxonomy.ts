import { z } from 'zod';
import rawDiagnosticData from './diagnostic-data.json';
import { HealthFactor } from '../../shared/types';

const diagnosticDataSchema = z.object({
  symptomCategories: z.record(
    z.object({
      label: z.string(),
      symptoms: z.array(z.string().regex(/^[a-z0-9]+(_[a-z0-9]+)*$/)).min(1),
      severityLevels: z.array(z.string()),
      associatedFactors: z.array(z.string()),
    })
  ),
  healthFactors: z.record(
    z.object({
      factor: z.string(),
      impactLevel: z.enum(['high', 'medium', 'low']),
      relatedSymptoms: z.array(z.string()),
      recommendations: z.array(z.string()),
    })
  ),
  diagnosticPatterns: z.record(
    z.record(
      z.object({
        symptoms: z.array(z.string()).min(1),
        likelyCauses: z.array(z.string()).min(1),
        confidenceThreshold: z.number().min(0).max(1),
      })
    )
  ),
  recommendedTests: z.record(z.array(z.string())),
});

export type DiagnosticData = z.infer<typeof diagnosticDataSchema>;

/** Category key to the canonical symptom keys it owns. */
export type SymptomTaxonomy = Record<string, string[]>;

export const diagnosticData: DiagnosticData = diagnosticDataSchema.parse(rawDiagnosticData);

export function getSymptomTaxonomy(data: DiagnosticData = diagnosticData): SymptomTaxonomy {
  const taxonomy: SymptomTaxonomy = {};
  for (const [category, entry] of Object.entries(data.symptomCategories)) {
    taxonomy[category] = entry.symptoms;
  }
  return taxonomy;
}

/**
 * Health factors whose related symptoms overlap the given symptom keys.
 */
export function getHealthFactorsBySymptoms(
  symptomKeys: string[],
  data: DiagnosticData = diagnosticData
): HealthFactor[] {
  const wanted = new Set(symptomKeys);

  return Object.values(data.healthFactors)
    .filter((factor) => factor.relatedSymptoms.some((symptom) => wanted.has(symptom)))
    .map((factor) => ({
      factor: factor.factor,
      impactLevel: factor.impactLevel,
      relatedSymptoms: [...factor.relatedSymptoms],
      recommendations: [...factor.recommendations],
    }));
}
