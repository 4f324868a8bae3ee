import { describe, it, expect } from 'vitest';
import {
  extractInstallsToken,
  extractLeadingRank,
  extractOwnerRepo,
  extractRankToken,
  extractTrailingInstalls,
  isCredibleInstalls,
  isSmallPlainInteger,
  matchSkillPath,
  normalizeHref,
  ownerRepoFromUrl,
  skillSlugFromUrl,
} from './fields';

const ORIGIN = 'https://skills.sh';

describe('fields', () => {
  describe('normalizeHref', () => {
    it('joins root-relative paths with the origin', () => {
      expect(normalizeHref('/acme/widget/cool-skill', ORIGIN)).toBe(
        'https://skills.sh/acme/widget/cool-skill',
      );
    });

    it('passes absolute http(s) URLs through after trimming', () => {
      expect(normalizeHref('  https://skills.sh/a/b/c ', ORIGIN)).toBe('https://skills.sh/a/b/c');
      expect(normalizeHref('http://skills.sh/a/b/c', ORIGIN)).toBe('http://skills.sh/a/b/c');
    });

    it('rejects fragments, mailto and relative paths', () => {
      expect(normalizeHref('mailto:foo@bar.com', ORIGIN)).toBeNull();
      expect(normalizeHref('#top', ORIGIN)).toBeNull();
      expect(normalizeHref('acme/widget/cool-skill', ORIGIN)).toBeNull();
    });
  });

  describe('matchSkillPath', () => {
    it('matches the owner/repo/skill shape', () => {
      expect(matchSkillPath('https://skills.sh/acme/widget/cool-skill', ORIGIN)).toEqual({
        owner: 'acme',
        repo: 'widget',
        skill: 'cool-skill',
      });
    });

    it('rejects other path shapes and hosts', () => {
      expect(matchSkillPath('https://skills.sh/acme/widget', ORIGIN)).toBeNull();
      expect(matchSkillPath('https://skills.sh/acme/widget/cool-skill/extra', ORIGIN)).toBeNull();
      expect(matchSkillPath('https://skills.sh/acme/widget/cool-skill?tab=1', ORIGIN)).toBeNull();
      expect(matchSkillPath('https://skills.sh/acme/widget/cool-skill#top', ORIGIN)).toBeNull();
      expect(matchSkillPath('https://example.com/acme/widget/cool-skill', ORIGIN)).toBeNull();
      expect(matchSkillPath('https://skillsxsh/acme/widget/cool-skill', ORIGIN)).toBeNull();
    });
  });

  describe('installs tokens', () => {
    it('takes the first numeric or magnitude token', () => {
      expect(extractInstallsToken('cool-skill acme/widget 61.0K')).toBe('61.0K');
      expect(extractInstallsToken('12,345 installs')).toBe('12,345');
      expect(extractInstallsToken('1.2M total')).toBe('1.2M');
      expect(extractInstallsToken('no numbers here')).toBeNull();
    });

    it('anchors the trailing token at the end of the text', () => {
      expect(extractTrailingInstalls('1 ### foo bar/baz 5')).toBe('5');
      expect(extractTrailingInstalls('foo bar/baz 61.0K')).toBe('61.0K');
      expect(extractTrailingInstalls('foo bar/baz 61.0K trailing')).toBeNull();
    });
  });

  describe('rank tokens', () => {
    it('finds the first standalone 1-3 digit token', () => {
      expect(extractRankToken('42 cool-skill acme/widget 61.0K')).toBe(42);
      expect(extractRankToken('1234 only')).toBeNull();
    });

    it('reads a leading rank only at the very start', () => {
      expect(extractLeadingRank('1 ### foo bar/baz 5')).toBe(1);
      expect(extractLeadingRank('foo 1')).toBeNull();
      expect(extractLeadingRank('1234 foo')).toBeNull();
    });
  });

  it('extracts the first owner/repo pair', () => {
    expect(extractOwnerRepo('1 ### foo bar/baz 5')).toBe('bar/baz');
    expect(extractOwnerRepo('vercel-react-best-practices vercel-labs/agent-skills 61.0K')).toBe(
      'vercel-labs/agent-skills',
    );
    expect(extractOwnerRepo('no pair')).toBeNull();
  });

  it('derives slug and owner/repo from URLs', () => {
    expect(skillSlugFromUrl('https://skills.sh/acme/widget/cool-skill/')).toBe('cool-skill');
    expect(ownerRepoFromUrl('https://skills.sh/acme/widget/cool-skill')).toBe('acme/widget');
    expect(ownerRepoFromUrl('https://skills.sh/acme')).toBeNull();
  });

  it('flags 1-2 digit plain integers', () => {
    expect(isSmallPlainInteger('5')).toBe(true);
    expect(isSmallPlainInteger('42')).toBe(true);
    expect(isSmallPlainInteger('123')).toBe(false);
    expect(isSmallPlainInteger('5K')).toBe(false);
    expect(isSmallPlainInteger(null)).toBe(false);
  });

  it('accepts only credible install counts', () => {
    expect(isCredibleInstalls('61.0K')).toBe(true);
    expect(isCredibleInstalls('2m')).toBe(true);
    expect(isCredibleInstalls('1000')).toBe(true);
    expect(isCredibleInstalls('12,345')).toBe(true);
    expect(isCredibleInstalls('999')).toBe(false);
    expect(isCredibleInstalls('5')).toBe(false);
    expect(isCredibleInstalls('1.5')).toBe(false);
    expect(isCredibleInstalls('abc')).toBe(false);
    expect(isCredibleInstalls(null)).toBe(false);
  });

  it('treats full-width digits as digits', () => {
    expect(extractInstallsToken('cool-skill ６１K')).toBe('６１K');
    expect(extractTrailingInstalls('foo bar/baz １２,３４５')).toBe('１２,３４５');
    expect(extractRankToken('４２ cool-skill')).toBe(42);
    expect(extractRankToken('４２３４ cool-skill')).toBeNull();
    expect(extractLeadingRank('７ ### foo')).toBe(7);
    expect(isSmallPlainInteger('５')).toBe(true);
    expect(isCredibleInstalls('６１K')).toBe(true);
    expect(isCredibleInstalls('１２,３４５')).toBe(true);
    expect(isCredibleInstalls('９９９')).toBe(false);
  });
});
