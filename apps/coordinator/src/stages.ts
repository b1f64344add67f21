import { companyOf, defineStages } from '@leadforge/sdk';

// Placeholder stages for local dev. Real deployments inject their own
// miner/validator/synthesizer through createCoordinator().
export const defaultStages = defineStages({
    mine: (lead) => {
        const company = companyOf(lead);
        return {
            company,
            signals: [
                `${company} mentioned cost pressures on forums`,
                `${company} evaluating cloud spend reduction`,
            ],
        };
    },

    validate: (lead) => ({
        company: companyOf(lead),
        tech_stack: ['AWS', 'Salesforce'],
        risks: ['Unknown budget owner'],
    }),

    synthesize: (lead, mined, validated) => {
        const company = companyOf(lead);
        const signals = stringList(mined.signals);
        const risks = stringList(validated.risks);
        const score = Math.max(0, Math.min(100, (signals.length > 0 ? 90 : 70) - risks.length * 5));

        const wedge = signals.join(' ').toLowerCase().includes('cost')
            ? `${company} faces cost pressure; lead with ROI and consolidation.`
            : `${company} can trim tooling costs with your bundled pricing.`;

        return {
            company,
            fit_score: score,
            wedge,
            tech_stack: stringList(validated.tech_stack),
            signals,
        };
    },
});

function stringList(value: unknown): string[] {
    return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}
