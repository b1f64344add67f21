import { companyOf, defineStages, Stages } from '../src';

describe('defineStages', () => {
    const stages: Stages = {
        mine: (lead) => ({ company: companyOf(lead), signals: ['hiring'] }),
        validate: () => ({ risks: [] }),
        synthesize: (_lead, mined, validated) => ({ ...mined, ...validated }),
    };

    test('returns callable stages', async () => {
        const defined = defineStages(stages);
        const ctx = { jobId: 'job-1', workspace: null };

        const mined = await defined.mine({ company: 'Acme Corp' }, ctx);
        expect(mined).toEqual({ company: 'Acme Corp', signals: ['hiring'] });
        expect(Object.isFrozen(defined)).toBe(true);
    });

    test('rejects a missing stage', () => {
        const broken = Object.assign({}, stages, { validate: undefined });
        expect(() => defineStages(broken)).toThrow('Stage "validate" must be a function');
    });
});

describe('companyOf', () => {
    test('falls back to name, then a placeholder', () => {
        expect(companyOf({ company: 'Acme Corp' })).toBe('Acme Corp');
        expect(companyOf({ name: 'Beta LLC' })).toBe('Beta LLC');
        expect(companyOf({})).toBe('Unknown Co');
    });
});
