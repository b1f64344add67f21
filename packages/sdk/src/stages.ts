import { Lead, StageName, Stages } from './types';

export const STAGE_NAMES: readonly StageName[] = ['mine', 'validate', 'synthesize'];

/**
 * Checks that every stage is present and returns a frozen copy.
 *
 * @example
 * const stages = defineStages({
 *   mine: (lead) => ({ company: lead.company, signals: [] }),
 *   validate: (lead) => ({ company: lead.company, risks: [] }),
 *   synthesize: (lead, mined, validated) => ({ ...mined, ...validated }),
 * });
 */
export function defineStages(stages: Stages): Readonly<Stages> {
    for (const name of STAGE_NAMES) {
        if (typeof stages[name] !== 'function') {
            throw new Error(`Stage "${name}" must be a function`);
        }
    }
    return Object.freeze({
        mine: stages.mine.bind(stages),
        validate: stages.validate.bind(stages),
        synthesize: stages.synthesize.bind(stages),
    });
}

/** Company name a stage should work with, matching the fallbacks callers rely on. */
export function companyOf(lead: Lead): string {
    return lead.company || lead.name || 'Unknown Co';
}
