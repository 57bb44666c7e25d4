import { describe, it, expect } from 'vitest';
import { DrugInteractionChecker } from '../interactions/drug-interaction-checker.js';

describe('DrugInteractionChecker', () => {
  const checker = new DrugInteractionChecker();

  it('should report a known critical pair', () => {
    expect(checker.check('Warfarin', 'Aspirin')).toEqual({
      interactionFound: true,
      severity: 'critical',
      reaction: 'Marked rise in bleeding risk as the anticoagulant effect of warfarin is increased.',
      action: 'Avoid the combination. If unavoidable, monitor INR closely.',
      source: 'BNF Drug Interaction Checker',
      sourceUrl: 'https://bnf.nice.org.uk/interaction/warfarin/',
      searchUrl:
        'https://www.google.com/search?q=warfarin+aspirin+drug+interaction+management',
    });
  });

  it('should match a pair in either order', () => {
    expect(checker.find('aspirin', 'warfarin')).toBe(checker.find('warfarin', 'aspirin'));
  });

  it('should match names that contain a table key', () => {
    const result = checker.check('Aspirin 75mg', ' warfarin ');

    expect(result.interactionFound).toBe(true);
    if (result.interactionFound) {
      expect(result.severity).toBe('critical');
      expect(result.searchUrl).toBe(
        'https://www.google.com/search?q=aspirin+75mg+warfarin+drug+interaction+management'
      );
    }
  });

  it('should return the first matching row in table order', () => {
    expect(checker.find('ssri', 'tramadol')?.drugs).toEqual(['ssri', 'tramadol']);
    expect(checker.find('metformin', 'contrast')?.severity).toBe('moderate');
    expect(checker.find('simvastatin', 'grapefruit juice')?.drugs).toEqual(['statin', 'grapefruit']);
  });

  it('should return verification links when no pair matches', () => {
    expect(checker.check('paracetamol', 'amoxicillin')).toEqual({
      interactionFound: false,
      severity: 'none',
      message: 'No major interaction found in database. Always verify with clinical pharmacist.',
      verifyLinks: {
        drugsCom: 'https://www.drugs.com/drug_interactions.php',
        bnf: 'https://bnf.nice.org.uk',
      },
    });
  });

  it('should never match an empty drug name', () => {
    expect(checker.find('', 'aspirin')).toBeUndefined();
    expect(checker.find('warfarin', '   ')).toBeUndefined();
  });

  it('should use an injected table', () => {
    const custom = new DrugInteractionChecker([
      {
        drugs: ['alpha', 'beta'],
        severity: 'minor',
        reaction: 'Test reaction',
        action: 'Test action',
        source: 'Test source',
        sourceUrl: 'https://example.com/interaction',
      },
    ]);

    expect(custom.find('beta', 'alpha')?.reaction).toBe('Test reaction');
    expect(custom.find('warfarin', 'aspirin')).toBeUndefined();
  });
});
