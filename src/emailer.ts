import { Resend } from 'resend';
import { log } from './logger.js';
import type { EmailEnv } from './config.js';
import type { DigestMessage, Posting } from './types.js';

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export interface CompanyGroup {
  company: string;
  postings: Posting[];
}

export function groupByCompany(postings: readonly Posting[]): CompanyGroup[] {
  const groups = new Map<string, Posting[]>();
  for (const posting of postings) {
    const list = groups.get(posting.company);
    if (list) {
      list.push(posting);
    } else {
      groups.set(posting.company, [posting]);
    }
  }

  return [...groups.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([company, list]) => ({
      company,
      postings: [...list].sort((a, b) => a.title.localeCompare(b.title)),
    }));
}

function postingRowHTML(posting: Posting): string {
  const location = posting.location || 'Location not listed';
  return `
        <tr>
          <td style="padding:10px 12px;border-bottom:1px solid #eee;">
            <a href="${escapeHtml(posting.url)}" style="color:#2196F3;text-decoration:none;font-weight:bold;font-size:15px;">${escapeHtml(posting.title)}</a>
            <br><span style="color:#777;font-size:13px;">${escapeHtml(location)}</span>
          </td>
        </tr>`;
}

function companySectionHTML(group: CompanyGroup): string {
  return `
    <div style="border:1px solid #e0e0e0;border-radius:8px;margin-bottom:16px;background:#fff;overflow:hidden;">
      <h2 style="margin:0;padding:12px;font-size:17px;color:#1a1a1a;background:#fafafa;border-bottom:1px solid #e0e0e0;">${escapeHtml(group.company)} <span style="color:#999;font-weight:normal;font-size:14px;">(${group.postings.length})</span></h2>
      <table style="width:100%;border-collapse:collapse;">${group.postings.map(postingRowHTML).join('')}
      </table>
    </div>`;
}

export function generateDigestHTML(postings: readonly Posting[]): string {
  const groups = groupByCompany(postings);
  const sections = groups.map(companySectionHTML).join('');

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width,initial-scale=1">
</head>
<body style="margin:0;padding:0;background:#f5f5f5;font-family:-apple-system,BlinkMacSystemFont,'Segoe UI',Roboto,sans-serif;">
  <div style="max-width:600px;margin:0 auto;padding:20px;">
    <h1 style="font-size:22px;color:#1a1a1a;margin-bottom:20px;">${postings.length} new posting${postings.length === 1 ? '' : 's'} at ${groups.length} compan${groups.length === 1 ? 'y' : 'ies'}</h1>
    ${sections}
  </div>
</body>
</html>`;
}

export function generateDigestText(postings: readonly Posting[]): string {
  return groupByCompany(postings)
    .map((group) =>
      [group.company, ...group.postings.map((p) => `- ${p.title} (${p.location || 'Location not listed'})\n  ${p.url}`)].join(
        '\n',
      ),
    )
    .join('\n\n');
}

export function generateSubject(subjectPrefix: string, count: number): string {
  return `${subjectPrefix}: ${count} new posting${count === 1 ? '' : 's'}`;
}

export function formatDigest(postings: readonly Posting[], subjectPrefix: string): DigestMessage {
  return {
    subject: generateSubject(subjectPrefix, postings.length),
    html: generateDigestHTML(postings),
    text: generateDigestText(postings),
  };
}

export interface Notifier {
  send(message: DigestMessage): Promise<boolean>;
}

export interface EmailClient {
  emails: {
    send(payload: {
      from: string;
      to: string;
      subject: string;
      html: string;
      text: string;
    }): Promise<{ error: { message: string } | null }>;
  };
}

export class ResendNotifier implements Notifier {
  private readonly client: EmailClient;

  constructor(
    private readonly env: EmailEnv,
    client?: EmailClient,
  ) {
    this.client = client ?? new Resend(env.RESEND_API_KEY);
  }

  async send(message: DigestMessage): Promise<boolean> {
    if (message.html.trim().length === 0) {
      throw new Error('Refusing to send an empty digest');
    }

    log.info(`Sending email to ${this.env.RECIPIENT_EMAIL}: "${message.subject}"`);

    try {
      const { error } = await this.client.emails.send({
        from: this.env.SENDER_EMAIL,
        to: this.env.RECIPIENT_EMAIL,
        subject: message.subject,
        html: message.html,
        text: message.text,
      });
      if (error) {
        log.error(`Email send failed: ${error.message}`);
        return false;
      }
      log.info('Email sent successfully');
      return true;
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      log.error(`Email send failed: ${reason}`);
      return false;
    }
  }
}
