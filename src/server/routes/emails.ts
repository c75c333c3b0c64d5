/**
 * Email drafting and the saved-email list.
 *
 * POST   /api/emails                     { emailType, language? }
 * GET    /api/emails
 * DELETE /api/emails
 * DELETE /api/emails/:index
 * GET    /api/emails/:index/export?format=md|html|txt&language=
 */

import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../middleware/async-handler.js';
import { LanguageSchema, parseBody } from '../middleware/validate-body.js';
import type { ServerDeps } from '../types.js';
import type { EmailResult } from '../../assistant/answer-orchestrator.js';
import { EXPORT_FORMATS, exportEmail, isExportFormat } from '../../export/email-export.js';
import { getText } from '../../i18n/locales.js';
import { ValidationError } from '../../utils/errors.js';

const EmailBodySchema = z.object({
  emailType: z.string().trim().min(1).max(200),
  language: LanguageSchema.optional(),
});

const ExportQuerySchema = z.object({
  format: z.string().default('md'),
  language: LanguageSchema.optional(),
});

const STATUS: Record<EmailResult['kind'], number> = {
  email: 201,
  'rate-limited': 429,
  failed: 502,
};

function parseIndex(raw: string): number {
  const index = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(index)) {
    throw new ValidationError(`Invalid email index: ${raw}`, 'INVALID_INPUT');
  }
  return index;
}

export function createEmailsRouter(deps: ServerDeps): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const body = parseBody(EmailBodySchema, req.body);
      const result = await deps.assistant.generateEmail({
        emailType: body.emailType,
        language: body.language ?? deps.defaultLanguage,
      });
      res.status(STATUS[result.kind]).json(result);
    }),
  );

  router.get('/', (_req, res) => {
    res.json({ emails: deps.emails.list().map((email, index) => ({ index, ...email })) });
  });

  router.delete('/', (_req, res) => {
    const persisted = deps.emails.clear();
    res.json({ cleared: true, persisted });
  });

  router.delete('/:index', (req, res) => {
    const index = parseIndex(req.params.index);
    if (!deps.emails.deleteAt(index)) {
      res.status(404).json({ error: `No email at index ${index}` });
      return;
    }
    res.json({ deleted: index });
  });

  router.get('/:index/export', (req, res) => {
    const index = parseIndex(req.params.index);
    const query = parseBody(ExportQuerySchema, req.query);
    if (!isExportFormat(query.format)) {
      throw new ValidationError('format must be md, html or txt', 'INVALID_INPUT');
    }

    const email = deps.emails.get(index);
    if (!email) {
      res.status(404).json({ error: `No email at index ${index}` });
      return;
    }

    const { extension, mimeType } = EXPORT_FORMATS[query.format];
    const document = exportEmail(query.format, {
      content: email.content,
      emailType: email.type,
      timestampLabel: getText(query.language ?? deps.defaultLanguage, 'timestamp'),
      generatedAt: new Date(email.timestamp),
    });

    res
      .type(mimeType)
      .attachment(`unihelp_email_${index}.${extension}`)
      .send(document);
  });

  return router;
}
