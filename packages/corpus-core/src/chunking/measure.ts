/**
 * FILE PURPOSE: Length measures behind the chunk budget
 *
 * WHY: Two budget units coexist: tokenizer tokens for model input, and
 *      characters/words for the cheaper general-corpus chunking. The chunker
 *      only ever sees a `Measure`.
 * HOW: A tokenizer that throws must not abort the run. The failing
 *      measurement is reported as Infinity, which the chunker reads as
 *      "over budget" and answers with a flush or a finer split.
 */

import { ChunkerConfigError } from '../errors.js';
import { countTokens } from '../tokenizer/index.js';
import type { Tokenizer } from '../tokenizer/index.js';
import { splitIntoWords } from './sentences.js';

export type BudgetUnit = 'tokens' | 'characters' | 'words';

export type Measure = (text: string) => number;

export interface MeasureFailure {
  sample: string;
  error: unknown;
}

export interface SafeMeasure {
  measure: Measure;
  failures: MeasureFailure[];
}

export function createMeasure(unit: BudgetUnit, tokenizer?: Tokenizer): Measure {
  switch (unit) {
    case 'tokens': {
      if (!tokenizer) {
        throw new ChunkerConfigError('budgetUnit "tokens" requires a tokenizer');
      }
      return (text) => countTokens(tokenizer, text);
    }
    case 'characters':
      return (text) => text.length;
    case 'words':
      return (text) => splitIntoWords(text).length;
  }
}

/** Wrap a measure so a throwing tokenizer yields Infinity and a recorded failure. */
export function guardMeasure(measure: Measure): SafeMeasure {
  const failures: MeasureFailure[] = [];
  return {
    failures,
    measure(text) {
      try {
        return measure(text);
      } catch (error) {
        failures.push({ sample: text, error });
        return Number.POSITIVE_INFINITY;
      }
    },
  };
}
