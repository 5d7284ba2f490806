import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../src/errors.js';
import {
  LetterComposer,
  cvExtract,
  formatLetterDate,
  joinFrench,
  leadParagraph,
  letterFileName,
  loadTemplate,
  renderTemplate,
} from '../src/letter.js';
import { UNSPECIFIED } from '../src/contracts.js';
import { match } from '../src/matcher.js';
import { SkillExtractor } from '../src/skills.js';
import type { Candidate, CandidateProfile } from '../src/types.js';
import { listing } from './helpers/fakes.js';

const TEMPLATE_PATH = fileURLToPath(new URL('../templates/letter.txt', import.meta.url));
const TODAY = new Date(2026, 9, 18);
const SHORT_TEMPLATE = 'Objet : {{title}} chez {{company}}\n{{skills_passage}}\n{{motivation}}\n{{signature}}';

const skills = new SkillExtractor([{ label: 'Python' }, { label: 'SQL' }, { label: 'Docker' }]);

const profile: CandidateProfile = {
  name: 'Camille Martin',
  contact: 'camille@example.com',
  motivation: 'Rejoindre {{company}} serait une chance.',
  signature: 'Camille Martin',
};

const candidate: Candidate = { profile, cvText: 'Python, SQL', background: '' };

function composer(template = SHORT_TEMPLATE): LetterComposer {
  return new LetterComposer(template, skills, { now: () => TODAY });
}

describe('renderTemplate', () => {
  it('substitutes known keys and leaves the rest', () => {
    expect(renderTemplate('{{a}} et {{b}}', { a: 'un' })).toBe('un et {{b}}');
  });

  it('does not expand placeholders inside substituted values', () => {
    expect(renderTemplate('{{a}}', { a: '{{b}}', b: 'deux' })).toBe('{{b}}');
  });
});

describe('joinFrench', () => {
  it('joins with commas and a final "et"', () => {
    expect(joinFrench([])).toBe('');
    expect(joinFrench(['SQL'])).toBe('SQL');
    expect(joinFrench(['SQL', 'Python'])).toBe('SQL et Python');
    expect(joinFrench(['SQL', 'Python', 'Docker'])).toBe('SQL, Python et Docker');
  });
});

describe('leadParagraph', () => {
  it('takes the first paragraph', () => {
    expect(leadParagraph('\nData engineer à Lyon.\n\nExpérience : trois ans.\n')).toBe('Data engineer à Lyon.');
  });

  it('falls back to the first 200 characters of a single block', () => {
    expect(leadParagraph('x'.repeat(250))).toBe('x'.repeat(200));
    expect(leadParagraph('  Une ligne  ')).toBe('Une ligne');
  });
});

describe('cvExtract', () => {
  it('quotes the CV and background lead paragraphs after a blank line', () => {
    const extract = cvExtract({
      profile,
      cvText: 'Data engineer, trois ans.\n\nCompétences : Python',
      background: 'Master en informatique.\n\nStage chez Acme',
    });

    expect(extract).toBe('\n\nData engineer, trois ans.\n\nMaster en informatique.');
  });

  it('is empty when there is nothing to quote', () => {
    expect(cvExtract({ profile, cvText: '  ', background: '' })).toBe('');
  });
});

describe('letterFileName', () => {
  it('stamps the date and strips unsafe characters', () => {
    const name = letterFileName({ text: '', date: TODAY, company: 'Acme & Co', title: 'Data Engineer (H/F)' });
    expect(name).toBe('20261018_Acme_Co_Data_Engineer_HF.txt');
  });
});

describe('formatLetterDate', () => {
  it('uses day/month/year', () => {
    expect(formatLetterDate(new Date(2026, 0, 5))).toBe('05/01/2026');
  });
});

describe('LetterComposer', () => {
  it('lists matched skills in the order the posting mentions them', () => {
    const posting = listing({ description: 'Nous utilisons SQL, Docker et Python.' });
    const result = match(posting, new Set(['python', 'sql']), skills.extractSkills(posting.description));

    const draft = composer().compose(candidate, posting, result);

    expect(draft.text).toBe(
      'Objet : Data Engineer chez Acme\n' +
        'Mon profil correspond aux qualifications que vous recherchez, notamment en ce qui concerne SQL et Python, comme le montre mon CV ci-joint.\n' +
        'Rejoindre Acme serait une chance.\n' +
        'Camille Martin',
    );
    expect(draft).toMatchObject({ date: TODAY, company: 'Acme', title: 'Data Engineer' });
  });

  it('still names the company and signs when no skill matches', () => {
    const posting = listing({ description: 'Poste de gestion de projet' });
    const result = match(posting, new Set(['python']), skills.extractSkills(posting.description));

    const draft = composer().compose({ ...candidate, profile: { ...profile, motivation: 'Je suis motivée.' } }, posting, result);

    expect(result.score).toBe(0);
    expect(draft.text).toBe(
      'Objet : Data Engineer chez Acme\n' +
        'Mon profil correspond aux qualifications que vous recherchez, comme le montre mon CV ci-joint.\n' +
        'Je suis motivée.\n\n' +
        'Particulièrement intéressé(e) par Acme, je souhaite mettre à profit mon expertise pour contribuer à vos projets.\n' +
        'Camille Martin',
    );
  });

  it('addresses an unnamed company generically', () => {
    const posting = listing({ company: UNSPECIFIED });
    const draft = composer('{{recipient}} / {{company}}').compose(candidate, posting, match(posting, new Set(), new Set()));

    expect(draft.text).toBe('Service recrutement / votre entreprise');
    expect(draft.company).toBe(UNSPECIFIED);
  });

  it('fills the bundled template', async () => {
    const template = await loadTemplate(TEMPLATE_PATH);
    const posting = listing({ description: 'Python et SQL indispensables' });
    const result = match(posting, new Set(['python', 'sql']), skills.extractSkills(posting.description));

    const draft = composer(template).compose(candidate, posting, result);

    expect(draft.text.startsWith('Camille Martin\ncamille@example.com\n\nService recrutement Acme\nAcme\n\nLe 18/10/2026\n')).toBe(
      true,
    );
    expect(draft.text).toContain("Suite à votre offre d'emploi pour le poste de Data Engineer à Paris, je vous présente");
    expect(draft.text).toContain('notamment en ce qui concerne Python et SQL,');
    expect(draft.text.trimEnd().endsWith('Camille Martin')).toBe(true);
    expect(draft.text).not.toMatch(/\{\{\w+\}\}/);
  });

  it('places the CV extract right after the skills passage', async () => {
    const template = await loadTemplate(TEMPLATE_PATH);
    const posting = listing({ description: 'Python attendu' });
    const withBackground: Candidate = {
      profile,
      cvText: 'Data engineer, trois ans.\n\nPython, SQL',
      background: 'Master en informatique.',
    };

    const draft = composer(template).compose(
      withBackground,
      posting,
      match(posting, new Set(['python']), skills.extractSkills(posting.description)),
    );

    expect(draft.text).toContain(
      'notamment en ce qui concerne Python, comme le montre mon CV ci-joint.\n\n' +
        'Data engineer, trois ans.\n\nMaster en informatique.\n\nRejoindre Acme serait une chance.',
    );
  });

  it('mentions apprenticeship in the opening', async () => {
    const template = await loadTemplate(TEMPLATE_PATH);
    const posting = listing({ isApprenticeship: true, contractType: 'Alternance', location: UNSPECIFIED });

    const draft = composer(template).compose(candidate, posting, match(posting, new Set(), new Set()));

    expect(draft.text).toContain('pour le poste de Data Engineer en alternance, je vous présente');
  });

  it('rejects a missing template with a configuration error', async () => {
    await expect(loadTemplate('/nonexistent/letter.txt')).rejects.toBeInstanceOf(ConfigurationError);
  });
});
