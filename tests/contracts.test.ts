import { describe, expect, it } from 'vitest';
import { UNSPECIFIED, identifyContractType, matchesContract, mentionsApprenticeship } from '../src/contracts.js';

describe('identifyContractType', () => {
  it('recognises apprenticeships', () => {
    expect(identifyContractType('Développeur en alternance', '')).toEqual({
      contractType: 'Alternance',
      detected: ['Alternance'],
      isApprenticeship: true,
    });
  });

  it('picks whichever of CDI and CDD is mentioned first', () => {
    expect(identifyContractType('Data Engineer', 'CDD puis CDI possible').contractType).toBe('CDD');
    expect(identifyContractType('Data Engineer', 'CDI, pas de CDD').contractType).toBe('CDI');
  });

  it('falls back to the unspecified label', () => {
    expect(identifyContractType('Data Engineer', '').contractType).toBe(UNSPECIFIED);
  });
});

describe('mentionsApprenticeship', () => {
  it('looks for alternance or apprentissage', () => {
    expect(mentionsApprenticeship('Contrat en Alternance')).toBe(true);
    expect(mentionsApprenticeship("Contrat d'apprentissage")).toBe(true);
    expect(mentionsApprenticeship('CDI')).toBe(false);
  });
});

describe('matchesContract', () => {
  it('matches on the contract label, ignoring case', () => {
    expect(matchesContract('cdi', 'CDI', false)).toBe(true);
    expect(matchesContract('stage', 'CDI', false)).toBe(false);
  });

  it('accepts apprenticeships under another label when alternance is asked for', () => {
    expect(matchesContract('alternance', 'Contrat pro', true)).toBe(true);
    expect(matchesContract('alternance', 'Contrat pro', false)).toBe(false);
  });
});
