import { describe, it, expect } from 'vitest';
import { buildFixerPrompt, buildGeneratorPrompt, sectionMarkers } from '../../src/core/prompts.js';
import { validateComponent } from '../../src/core/validator.js';
import { resolveNaming } from '../../src/naming.js';
import { RADIUS_ERROR_LINE, TAG_ERROR_LINE, TEST_TOKENS, TWO_ERROR_SOURCE } from '../fixtures/components.js';

const naming = resolveNaming('', 'profile-card');

describe('prompts', () => {
  describe('sectionMarkers', () => {
    it('should name the three files', () => {
      expect(sectionMarkers(naming)).toEqual({
        logic: '=== profile-card.component.ts ===',
        markup: '=== profile-card.component.html ===',
        style: '=== profile-card.component.css ===',
      });
    });
  });

  describe('buildGeneratorPrompt', () => {
    const prompt = buildGeneratorPrompt(TEST_TOKENS, naming, 'A profile card with an avatar');

    it('should carry the description in the user message', () => {
      expect(prompt.user).toBe('Generate the Angular component for this UI:\n\nA profile card with an avatar');
    });

    it('should state the output format and names', () => {
      expect(prompt.system).toContain('=== profile-card.component.ts ===\n<TypeScript component class>');
      expect(prompt.system).toContain("- selector: 'app-profile-card'");
      expect(prompt.system).toContain("- templateUrl: './profile-card.component.html'");
      expect(prompt.system).toContain("- styleUrls: ['./profile-card.component.css']");
      expect(prompt.system).toContain('- export class ProfileCardComponent');
    });

    it('should list every token value', () => {
      expect(prompt.system).toContain('  primary-color: #6366f1');
      expect(prompt.system).toContain('  border-radius: 8px');
      expect(prompt.system).toContain("  font-family: 'Inter', sans-serif");
    });

    it('should be deterministic', () => {
      expect(buildGeneratorPrompt(TEST_TOKENS, naming, 'A profile card with an avatar')).toEqual(prompt);
    });
  });

  describe('buildFixerPrompt', () => {
    const errors = validateComponent(TWO_ERROR_SOURCE, TEST_TOKENS);
    const prompt = buildFixerPrompt(TEST_TOKENS, naming, TWO_ERROR_SOURCE, errors);

    it('should list the literal errors in validator order', () => {
      expect(prompt.user).toContain(`VALIDATION ERRORS:\n- ${RADIUS_ERROR_LINE}\n- ${TAG_ERROR_LINE}\n`);
    });

    it('should include the previous sections under their markers', () => {
      expect(prompt.user).toContain(`=== profile-card.component.html ===\n${TWO_ERROR_SOURCE.markup}\n`);
      expect(prompt.user).toContain(`=== profile-card.component.css ===\n${TWO_ERROR_SOURCE.style}\n`);
      expect(prompt.user).toContain(`=== profile-card.component.ts ===\n${TWO_ERROR_SOURCE.logic}\n`);
    });

    it('should keep the token contract in the system message', () => {
      expect(prompt.system).toContain('Fix ONLY the listed validation errors');
      expect(prompt.system).toContain('  primary-color: #6366f1');
    });
  });
});
