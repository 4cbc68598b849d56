/**
 * Expert records: parsing, serialisation, persistence and merged listing
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ExpertFormatError, ExpertParseError } from '../errors';
import {
  agentFilename,
  assertFormattable,
  sourceMarker,
  toExpertId,
} from '../expert/naming';
import { parseExpert, renderExpertBody, serializeExpert } from '../expert/markdown';
import { CouncilExpertProvider, listExpertsInDir, loadExpertFile, saveExpert } from '../expert/store';
import { initCouncil, makeExpert, makeTempDir, removeDir, writeProjectFile } from './helpers';

const DHH_FILE = [
  '---',
  'id: dhh',
  'name: David Heinemeier Hansson',
  'focus: Rails and simplicity',
  '---',
  '',
  '# David Heinemeier Hansson - Rails and simplicity',
  '',
  'You are channeling David Heinemeier Hansson, known for expertise in Rails and simplicity.',
  '',
  '## Review Style',
  '',
  'When reviewing code, focus on your area of expertise. Be direct and specific.',
  'Explain your reasoning. Suggest concrete improvements.',
  '',
].join('\n');

describe('naming', () => {
  it('prefixes agent filenames by provenance', () => {
    expect(agentFilename(makeExpert())).toBe('dhh.md');
    expect(agentFilename(makeExpert({ source: 'custom' }))).toBe('custom-dhh.md');
    expect(agentFilename(makeExpert({ source: 'installed:acme' }))).toBe('installed-dhh.md');
  });

  it('marks non-project experts', () => {
    expect(sourceMarker(makeExpert())).toBe('');
    expect(sourceMarker(makeExpert({ source: 'custom' }))).toBe(' [custom]');
    expect(sourceMarker(makeExpert({ source: 'installed:acme' }))).toBe(' [installed:acme]');
  });

  it('derives kebab-case ids from names', () => {
    expect(toExpertId('Kent Beck')).toBe('kent-beck');
    expect(toExpertId('  Dan Abramov (React) ')).toBe('dan-abramov-react');
  });

  it('rejects records missing required fields', () => {
    expect(() => assertFormattable(makeExpert({ focus: ' ' }))).toThrow(
      new ExpertFormatError('dhh', 'focus is required'),
    );
    expect(() => assertFormattable(makeExpert({ id: '../escape' }))).toThrow(ExpertFormatError);
    expect(() => assertFormattable(makeExpert())).not.toThrow();
  });
});

describe('serializeExpert', () => {
  it('writes frontmatter and a synthesised body', () => {
    expect(serializeExpert(makeExpert())).toBe(DHH_FILE);
  });

  it('keeps an explicit body', () => {
    const text = serializeExpert(makeExpert({ body: '\n# Custom body\n\n' }));
    expect(text.endsWith('---\n\n# Custom body\n')).toBe(true);
  });

  it('is byte-identical for equal records', () => {
    const a = makeExpert({ principles: ['Convention over configuration'], triggers: ['rails'] });
    const b = makeExpert({ triggers: ['rails'], principles: ['Convention over configuration'] });
    expect(serializeExpert(a)).toBe(serializeExpert(b));
  });

  it('renders optional sections in order', () => {
    const body = renderExpertBody(
      makeExpert({ philosophy: ' Less is more. ', principles: ['Ship it'], redFlags: ['Premature abstraction'] }),
    );
    expect(body.split('\n')).toEqual([
      '# David Heinemeier Hansson - Rails and simplicity',
      '',
      'You are channeling David Heinemeier Hansson, known for expertise in Rails and simplicity.',
      '',
      '## Philosophy',
      '',
      'Less is more.',
      '',
      '## Principles',
      '',
      '- Ship it',
      '',
      '## Red Flags',
      '',
      'Watch for these patterns:',
      '- Premature abstraction',
      '',
      '## Review Style',
      '',
      'When reviewing code, focus on your area of expertise. Be direct and specific.',
      'Explain your reasoning. Suggest concrete improvements.',
    ]);
  });
});

describe('parseExpert', () => {
  it('reads frontmatter fields and body', () => {
    const expert = parseExpert(
      [
        '---',
        'id: kent-beck',
        'name: Kent Beck',
        'focus: Test-driven development',
        'red_flags:',
        '  - Untested code',
        'priority: high',
        'core: true',
        '---',
        '',
        '# Kent',
        '',
      ].join('\n'),
    );

    expect(expert).toEqual({
      id: 'kent-beck',
      name: 'Kent Beck',
      focus: 'Test-driven development',
      redFlags: ['Untested code'],
      priority: 'high',
      core: true,
      body: '# Kent',
      source: '',
    });
  });

  it('round-trips a serialised record', () => {
    const original = makeExpert({
      philosophy: 'Clarity first.',
      principles: ['Small commits', 'Readable names'],
      category: 'architecture',
      triggers: ['refactor'],
    });
    const parsed = parseExpert(serializeExpert(original));
    expect(serializeExpert(parsed)).toBe(serializeExpert(original));
    expect(parsed.principles).toEqual(['Small commits', 'Readable names']);
  });

  it('accepts CRLF line endings', () => {
    const expert = parseExpert('---\r\nid: a\r\nname: A\r\nfocus: F\r\n---\r\nbody\r\n');
    expect(expert.id).toBe('a');
    expect(expert.body).toBe('body');
  });

  it('fails without an opening fence', () => {
    expect(() => parseExpert('id: dhh\n', 'dhh.md')).toThrow(
      new ExpertParseError("missing frontmatter: file must start with '---'", 'dhh.md'),
    );
  });

  it('fails without a closing fence', () => {
    expect(() => parseExpert('---\nid: dhh\n')).toThrow("invalid frontmatter: missing closing '---'");
  });

  it('points at the line of a YAML syntax error', () => {
    const parse = () => parseExpert('---\nid: dhh\nname: [unclosed\n---\n');
    expect(parse).toThrow(ExpertParseError);
    expect(parse).toThrow(/^YAML error at line \d+:/);
  });

  it('rejects an unknown priority', () => {
    expect(() => parseExpert('---\nid: a\npriority: urgent\n---\n')).toThrow(/invalid frontmatter: priority:/);
  });
});

describe('expert store', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => removeDir(dir));

  it('saves and reloads an expert', () => {
    const file = path.join(dir, 'nested', 'dhh.md');
    saveExpert(makeExpert({ principles: ['Ship it'] }), file);

    expect(fs.readFileSync(file, 'utf-8')).toBe(serializeExpert(makeExpert({ principles: ['Ship it'] })));
    expect(loadExpertFile(file, 'custom')).toMatchObject({ id: 'dhh', principles: ['Ship it'], source: 'custom' });
  });

  it('lists markdown personas in filename order and reports broken ones', () => {
    writeProjectFile(dir, 'zed.md', serializeExpert(makeExpert({ id: 'zed', name: 'Zed' })));
    writeProjectFile(dir, 'alpha.md', serializeExpert(makeExpert({ id: 'alpha', name: 'Alpha' })));
    writeProjectFile(dir, 'README.md', '# Not an expert');
    writeProjectFile(dir, 'notes.txt', 'ignored');
    writeProjectFile(dir, 'broken.md', 'no frontmatter');
    writeProjectFile(dir, 'sub/inner.md', serializeExpert(makeExpert({ id: 'inner' })));

    const result = listExpertsInDir(dir, 'custom');

    expect(result.experts.map((e) => e.id)).toEqual(['alpha', 'zed']);
    expect(result.experts.every((e) => e.source === 'custom')).toBe(true);
    expect(result.warnings).toEqual([
      `could not load broken.md: ${path.join(dir, 'broken.md')}: missing frontmatter: file must start with '---'`,
    ]);
  });

  it('treats a missing directory as empty', () => {
    expect(listExpertsInDir(path.join(dir, 'absent'))).toEqual({ experts: [], warnings: [] });
  });
});

describe('CouncilExpertProvider', () => {
  let projectRoot: string;
  let userDir: string;

  beforeEach(() => {
    projectRoot = makeTempDir();
    userDir = makeTempDir('council-home-');
    initCouncil(projectRoot);
  });

  afterEach(() => {
    removeDir(projectRoot);
    removeDir(userDir);
  });

  it('merges installed, personal and project experts with provenance', () => {
    const dhh = serializeExpert(makeExpert());
    writeProjectFile(userDir, 'installed/zeta/dhh.md', dhh);
    writeProjectFile(userDir, 'installed/acme/dhh.md', dhh);
    writeProjectFile(userDir, 'my-council/dhh.md', dhh);
    writeProjectFile(projectRoot, '.council/experts/dhh.md', dhh);

    const { experts, warnings } = new CouncilExpertProvider({ projectRoot, userDir }).listExperts();

    expect(experts.map((e) => e.source)).toEqual(['installed:acme', 'installed:zeta', 'custom', '']);
    expect(warnings).toEqual([]);
  });

  it('works without a user directory', () => {
    writeProjectFile(projectRoot, '.council/experts/dhh.md', serializeExpert(makeExpert()));
    const provider = new CouncilExpertProvider({ projectRoot, userDir: path.join(userDir, 'missing') });
    expect(provider.listExperts().experts.map((e) => e.id)).toEqual(['dhh']);
  });
});
