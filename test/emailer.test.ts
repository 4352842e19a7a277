import { describe, it, expect, vi } from 'vitest';
import {
  escapeHtml,
  formatDigest,
  generateDigestHTML,
  generateDigestText,
  generateSubject,
  groupByCompany,
  ResendNotifier,
  type EmailClient,
} from '../src/emailer.js';
import type { EmailEnv } from '../src/config.js';
import { makePosting } from './helpers.js';

const env: EmailEnv = {
  RESEND_API_KEY: 'test-secret',
  SENDER_EMAIL: 'alerts@example.com',
  RECIPIENT_EMAIL: 'me@example.com',
};

const postings = [
  makePosting({ id: '3', company: 'Beta', title: 'BI Analyst', location: '', url: 'https://example.com/3' }),
  makePosting({ id: '1', company: 'Acme', title: 'Product Analyst', location: 'Austin, TX', url: 'https://example.com/1' }),
  makePosting({ id: '2', company: 'Acme', title: 'Data Analyst', location: 'Remote - US', url: 'https://example.com/2' }),
];

describe('groupByCompany', () => {
  it('sorts companies by name and postings by title', () => {
    const groups = groupByCompany(postings);
    expect(groups.map((g) => g.company)).toEqual(['Acme', 'Beta']);
    expect(groups[0].postings.map((p) => p.id)).toEqual(['2', '1']);
    expect(groups[1].postings.map((p) => p.id)).toEqual(['3']);
  });
});

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<b>R&D</b> "Ops" 'BI'`)).toBe('&lt;b&gt;R&amp;D&lt;/b&gt; &quot;Ops&quot; &#39;BI&#39;');
  });
});

describe('generateDigestText', () => {
  it('lists postings grouped by company', () => {
    expect(generateDigestText(postings)).toBe(
      [
        'Acme',
        '- Data Analyst (Remote - US)',
        '  https://example.com/2',
        '- Product Analyst (Austin, TX)',
        '  https://example.com/1',
        '',
        'Beta',
        '- BI Analyst (Location not listed)',
        '  https://example.com/3',
      ].join('\n'),
    );
  });
});

describe('generateDigestHTML', () => {
  it('renders a heading with totals and one section per company', () => {
    const html = generateDigestHTML(postings);
    expect(html).toContain('>3 new postings at 2 companies</h1>');
    expect(html).toContain('Acme <span style="color:#999;font-weight:normal;font-size:14px;">(2)</span>');
    expect(html).toContain('Beta <span style="color:#999;font-weight:normal;font-size:14px;">(1)</span>');
  });

  it('escapes titles and links', () => {
    const html = generateDigestHTML([
      makePosting({ title: '<script>alert(1)</script> Analyst', url: 'https://example.com/?a=1&b=2' }),
    ]);
    expect(html).toContain('&lt;script&gt;alert(1)&lt;/script&gt; Analyst</a>');
    expect(html).toContain('href="https://example.com/?a=1&amp;b=2"');
    expect(html).toContain('>1 new posting at 1 company</h1>');
  });
});

describe('generateSubject', () => {
  it('pluralizes the count', () => {
    expect(generateSubject('Job Alerts', 1)).toBe('Job Alerts: 1 new posting');
    expect(generateSubject('Job Alerts', 4)).toBe('Job Alerts: 4 new postings');
  });
});

describe('ResendNotifier', () => {
  function fakeClient(result: Awaited<ReturnType<EmailClient['emails']['send']>>) {
    const send = vi.fn(async (_payload: Parameters<EmailClient['emails']['send']>[0]) => result);
    return { client: { emails: { send } }, send };
  }

  it('sends the digest from the sender to the recipient', async () => {
    const { client, send } = fakeClient({ error: null });
    const digest = formatDigest(postings, 'Job Alerts');

    await expect(new ResendNotifier(env, client).send(digest)).resolves.toBe(true);
    expect(send).toHaveBeenCalledWith({
      from: 'alerts@example.com',
      to: 'me@example.com',
      subject: 'Job Alerts: 3 new postings',
      html: digest.html,
      text: digest.text,
    });
  });

  it('reports a provider error as a failed send', async () => {
    const { client } = fakeClient({ error: { message: 'domain not verified' } });
    await expect(new ResendNotifier(env, client).send(formatDigest(postings, 'Job Alerts'))).resolves.toBe(false);
  });

  it('reports a thrown client error as a failed send', async () => {
    const client: EmailClient = {
      emails: {
        send: async () => {
          throw new Error('socket hang up');
        },
      },
    };
    await expect(new ResendNotifier(env, client).send(formatDigest(postings, 'Job Alerts'))).resolves.toBe(false);
  });

  it('refuses an empty body', async () => {
    const { client, send } = fakeClient({ error: null });
    await expect(new ResendNotifier(env, client).send({ subject: 's', html: '  ', text: '' })).rejects.toThrow(
      'Refusing to send an empty digest',
    );
    expect(send).not.toHaveBeenCalled();
  });
});
