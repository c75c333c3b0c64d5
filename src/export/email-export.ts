/**
 * Downloadable renderings of a generated email.
 */

export type ExportFormat = 'md' | 'html' | 'txt';

export const EXPORT_FORMATS: Record<ExportFormat, { extension: string; mimeType: string }> = {
  md: { extension: 'md', mimeType: 'text/markdown' },
  html: { extension: 'html', mimeType: 'text/html' },
  txt: { extension: 'txt', mimeType: 'text/plain' },
};

export function isExportFormat(value: unknown): value is ExportFormat {
  return value === 'md' || value === 'html' || value === 'txt';
}

export interface ExportInput {
  content: string;
  emailType: string;
  /** Localized label for the generation time ("Generated on") */
  timestampLabel: string;
  generatedAt: Date;
}

const pad = (n: number) => String(n).padStart(2, '0');

/**
 * Local time as YYYY-MM-DD HH:MM.
 */
export function formatExportTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function toMarkdown(input: ExportInput): string {
  return [
    '# 🎓 UniHelp - Generated Email',
    '',
    `**Type:** ${input.emailType}  `,
    `**${input.timestampLabel}:** ${formatExportTimestamp(input.generatedAt)}`,
    '',
    '---',
    '',
    input.content,
    '',
    '---',
    '*Generated by UniHelp*',
    '',
  ].join('\n');
}

export function toHtml(input: ExportInput): string {
  const body = escapeHtml(input.content).replace(/\n/g, '<br>');
  return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>UniHelp - Generated Email</title>
    <style>
        body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', sans-serif; max-width: 800px; margin: 40px auto; padding: 20px; line-height: 1.6; }
        .header { background: linear-gradient(135deg, #667eea 0%, #764ba2 100%); color: white; padding: 30px; border-radius: 8px; margin-bottom: 30px; }
        .meta { color: #6b7280; font-size: 14px; margin-bottom: 20px; }
        .content { background: #f9fafb; padding: 20px; border-radius: 6px; border-left: 4px solid #667eea; }
        .footer { text-align: center; color: #9ca3af; font-size: 12px; margin-top: 30px; }
    </style>
</head>
<body>
    <div class="header">
        <h1>🎓 UniHelp - Generated Email</h1>
    </div>
    <div class="meta">
        <strong>Type:</strong> ${escapeHtml(input.emailType)}<br>
        <strong>${escapeHtml(input.timestampLabel)}:</strong> ${formatExportTimestamp(input.generatedAt)}
    </div>
    <div class="content">
        ${body}
    </div>
    <div class="footer">
        Generated by UniHelp
    </div>
</body>
</html>`;
}

const RULE_HEAVY = '═'.repeat(39);
const RULE_LIGHT = '─'.repeat(39);

export function toText(input: ExportInput): string {
  return [
    RULE_HEAVY,
    '   UniHelp - Generated Email',
    RULE_HEAVY,
    '',
    `Type: ${input.emailType}`,
    `${input.timestampLabel}: ${formatExportTimestamp(input.generatedAt)}`,
    '',
    RULE_LIGHT,
    '',
    input.content,
    '',
    RULE_LIGHT,
    'Generated by UniHelp',
    '',
  ].join('\n');
}

export function exportEmail(format: ExportFormat, input: ExportInput): string {
  switch (format) {
    case 'md':
      return toMarkdown(input);
    case 'html':
      return toHtml(input);
    case 'txt':
      return toText(input);
  }
}
