/**
 * Handlebars e-mail template renderer
 *
 * Templates live in `src/templates/email/*.hbs`. The document notification
 * template can be replaced by a file configured at runtime.
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import Handlebars, { type TemplateDelegate } from 'handlebars';
import { ok, err, type Result } from 'neverthrow';

import { createRenderError, type RenderError } from '../../core/errors.js';

import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface DocumentNotificationModel {
  portfolioId: string;
  ownerName: string;
  documentName: string;
  /** yyyy-MM-dd */
  documentDate: string;
  documentId: string;
  /** yyyy-MM-dd HH:mm:ss UTC */
  notificationDate: string;
  /** Empty for contacts */
  organizationName: string;
  isContact: boolean;
}

export interface ProcessingSummaryModel {
  operationLabel: string;
  statusText: string;
  hasErrors: boolean;
  dryRun: boolean;
  completedAt: string;
  processedCount: number;
  errorCount: number;
  errors: string[];
}

export interface ErrorAlertModel {
  title: string;
  message: string;
  details: string;
  occurredAt: string;
}

export interface TemplateModels {
  'document-notification': DocumentNotificationModel;
  'processing-summary': ProcessingSummaryModel;
  'error-alert': ErrorAlertModel;
}

export type TemplateName = keyof TemplateModels;

export interface TemplateRenderer {
  render<K extends TemplateName>(name: K, model: TemplateModels[K]): Result<string, RenderError>;
}

export interface TemplateRendererConfig {
  logger: Logger;
  /** Directory holding the built-in templates (resolved automatically when omitted) */
  templatesDir?: string;
  /** Replacement for the built-in document notification template */
  documentTemplatePath?: string | undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Finds the built-in templates directory from source or build output.
 */
export const resolveTemplatesDir = (): string => {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [
    // src/modules/notifier/shell/templates -> src/templates/email
    path.resolve(moduleDir, '../../../../templates/email'),
    // Project root, for compiled code under dist/
    path.resolve(process.cwd(), 'src/templates/email'),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) return candidate;
  }

  // Neither exists; report the source-relative path
  return candidates[0] ?? 'templates/email';
};

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const makeTemplateRenderer = (config: TemplateRendererConfig): TemplateRenderer => {
  const { logger, documentTemplatePath } = config;
  const log = logger.child({ component: 'TemplateRenderer' });
  const templatesDir = config.templatesDir ?? resolveTemplatesDir();
  const handlebars = Handlebars.create();
  const cache = new Map<TemplateName, TemplateDelegate>();

  const readCustomTemplate = (filePath: string): string | null => {
    try {
      return fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      log.warn(
        { error, templatePath: filePath },
        'Failed to load email template, using default template'
      );
      return null;
    }
  };

  const loadSource = (name: TemplateName): string => {
    if (name === 'document-notification' && documentTemplatePath !== undefined) {
      const custom = readCustomTemplate(documentTemplatePath);
      if (custom !== null) return custom;
    }
    return fs.readFileSync(path.join(templatesDir, `${name}.hbs`), 'utf8');
  };

  const getTemplate = (name: TemplateName): TemplateDelegate => {
    const cached = cache.get(name);
    if (cached !== undefined) return cached;

    const compiled = handlebars.compile(loadSource(name));
    cache.set(name, compiled);
    return compiled;
  };

  return {
    render<K extends TemplateName>(name: K, model: TemplateModels[K]): Result<string, RenderError> {
      try {
        return ok(getTemplate(name)(model));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        log.error({ error, template: name }, 'Failed to render email template');
        return err(createRenderError(message));
      }
    },
  };
};
