import * as TOML from '@iarna/toml';
import { Octokit } from '@octokit/rest';
import { describe, expect, it, vi } from 'vitest';
import { loadRfdsFromRepo, parseRfdCsv, renderRfdIndex } from '../src/rfds';
import { TEMPLATE_WARNING } from '../src/template';

const CSV = [
  'number,title,link,state,discussion',
  '12,Second,https://rfd.example.com/12,published,https://github.com/example/rfd/pull/3',
  '3,"First, with a comma",https://rfd.example.com/3,discussion,',
  '',
].join('\n');

describe('parseRfdCsv', () => {
  it('maps rows by number in ascending order', () => {
    const rfds = parseRfdCsv(CSV);

    expect([...rfds.keys()]).toEqual([3, 12]);
    expect(rfds.get(3)).toEqual({
      number: '3',
      title: 'First, with a comma',
      link: 'https://rfd.example.com/3',
      state: 'discussion',
      discussion: '',
    });
    expect(rfds.get(12)?.discussion).toBe('https://github.com/example/rfd/pull/3');
  });

  it('returns an empty map for a header-only file', () => {
    expect(parseRfdCsv('number,title,link,state,discussion\n').size).toBe(0);
  });

  it('rejects a non-numeric number', () => {
    expect(() => parseRfdCsv('number,title,link,state,discussion\nabc,T,L,S,D\n')).toThrow(
      'RFD csv line 2 has a non-numeric RFD number "abc"'
    );
  });

  it.each([' 12', '12 ', '+12', '9007199254740993'])('rejects the RFD number "%s"', (number) => {
    expect(() => parseRfdCsv(`number,title,link,state,discussion\n${number},T,L,S,D\n`)).toThrow(
      `RFD csv line 2 has a non-numeric RFD number "${number}"`
    );
  });

  it('rejects a short row', () => {
    expect(() => parseRfdCsv('number,title,link,state,discussion\n1,T,L\n')).toThrow(
      'RFD csv line 2 has 3 columns, expected 5'
    );
  });
});

describe('renderRfdIndex', () => {
  it('writes the header and a TOML array of RFDs', () => {
    const out = renderRfdIndex(parseRfdCsv(CSV));

    expect(out.startsWith(TEMPLATE_WARNING)).toBe(true);
    const doc = TOML.parse(out);
    expect(doc.rfds).toEqual([
      {
        number: '3',
        title: 'First, with a comma',
        link: 'https://rfd.example.com/3',
        state: 'discussion',
        discussion: '',
      },
      {
        number: '12',
        title: 'Second',
        link: 'https://rfd.example.com/12',
        state: 'published',
        discussion: 'https://github.com/example/rfd/pull/3',
      },
    ]);
  });
});

describe('loadRfdsFromRepo', () => {
  it('reads .helpers/rfd.csv from the org rfd repo', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      new Response(
        JSON.stringify({
          type: 'file',
          name: 'rfd.csv',
          path: '.helpers/rfd.csv',
          encoding: 'base64',
          content: Buffer.from(CSV, 'utf8').toString('base64'),
        }),
        { status: 200, headers: { 'Content-Type': 'application/json' } }
      )
    );
    const github = new Octokit({ auth: 'test-github-token', request: { fetch: fetchMock } });

    const rfds = await loadRfdsFromRepo(github, 'example');

    expect([...rfds.keys()]).toEqual([3, 12]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(String(fetchMock.mock.calls[0][0])).toContain('/repos/example/rfd/contents/');
  });
});
