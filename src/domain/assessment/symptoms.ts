import { Evidence } from '../../shared/types';
import { SymptomTaxonomy, getSymptomTaxonomy } from './taxonomy';

/**
 * Substring scan of a user message against the taxonomy.
 *
 * `hair_loss` matches when "hair loss" appears anywhere in the case-folded
 * message. Overlapping keys match independently ("oily" text can hit both
 * oily_skin and oily_hair if both phrases are present).
 */
export function extractSymptoms(
  message: string,
  taxonomy: SymptomTaxonomy = getSymptomTaxonomy()
): Evidence {
  const text = message.toLowerCase();
  const found: Evidence = {};

  for (const [category, symptoms] of Object.entries(taxonomy)) {
    for (const symptom of symptoms) {
      if (text.includes(symptom.replace(/_/g, ' '))) {
        found[symptom] = { category, mentioned: true };
      }
    }
  }

  return found;
}

/**
 * Union of two evidence maps. Existing entries are kept as they are.
 */
export function mergeEvidence(current: Evidence, found: Evidence): Evidence {
  const merged: Evidence = { ...current };

  for (const [symptom, evidence] of Object.entries(found)) {
    if (!(symptom in merged)) {
      merged[symptom] = evidence;
    }
  }

  return merged;
}
