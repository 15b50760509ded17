/**
 * Typeset template rendering
 *
 * Fills a LaTeX template with a topic document using nunjucks. The
 * delimiters avoid LaTeX's braces and percent signs:
 *
 *   <<% if subtitulo %>> ... <<% endif %>>   statements
 *   << tema >>                                 expressions
 *
 * Comments are `<<# ... #>>`; the shipped template does not use them.
 */

import * as fs from 'fs';
import * as path from 'path';

import * as nunjucks from 'nunjucks';

import { TemplateError, toError } from '../errors';
import { classifySlide } from '../layout/classifier';
import { defaultLogger, Logger } from '../logging/console-logger';
import { LayoutMode } from '../models/deck.model';
import { isVisualItem } from '../models/topic.model';
import { decodeTopic } from '../parsers/topic-parser';
import { validateVisual } from '../renderers';

/** Template shipped with the package */
export const DEFAULT_TEMPLATE_PATH = path.resolve(__dirname, '../../templates/beamer.tex.njk');

export const TEMPLATE_TAGS = {
  blockStart: '<<%',
  blockEnd: '%>>',
  variableStart: '<<',
  variableEnd: '>>',
  commentStart: '<<#',
  commentEnd: '#>>',
};

/**
 * A slide as the template sees it: the source fields with defaults, plus
 * the layout mode the presentation backend would use for it
 */
export interface TypesetSlide {
  titulo: string;
  contenido: unknown[];
  layout: LayoutMode;
  [field: string]: unknown;
}

export interface TypesetContext {
  tema: string;
  subtitulo: string;
  diapositivas: TypesetSlide[];
  [field: string]: unknown;
}

export interface TypesetTemplate {
  templatePath: string;
  render(context: TypesetContext): string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode and shape-check a raw topic document, then lay the decoded titles
 * and each slide's layout over the source fields so templates can still
 * address items by their `tipo`. Malformed documents throw the same
 * ContentDecodeError / ShapeMismatchError the presentation backend does.
 */
export function buildTypesetContext(document: unknown, logger: Logger = defaultLogger): TypesetContext {
  const topic = decodeTopic(document, logger);
  for (const slide of topic.slides) {
    slide.content.filter(isVisualItem).forEach(validateVisual);
  }

  const root = isRecord(document) ? document : {};
  const rawSlides = Array.isArray(root.diapositivas) ? root.diapositivas : [];

  const diapositivas = topic.slides.map((slide, index): TypesetSlide => {
    const raw: unknown = rawSlides[index];
    const fields = isRecord(raw) ? raw : {};
    return {
      ...fields,
      titulo: slide.title,
      contenido: Array.isArray(fields.contenido) ? fields.contenido : [],
      layout: classifySlide(slide.content),
    };
  });

  return {
    ...root,
    tema: topic.title,
    subtitulo: topic.subtitle ?? '',
    diapositivas,
  };
}

/**
 * Load a template from disk, configured with the LaTeX-friendly delimiters
 */
export function loadTypesetTemplate(templatePath: string): TypesetTemplate {
  const resolved = path.resolve(templatePath);
  if (!fs.existsSync(resolved)) {
    throw new TemplateError(`Template not found: ${resolved}`, resolved);
  }

  const env = new nunjucks.Environment(new nunjucks.FileSystemLoader(path.dirname(resolved)), {
    autoescape: false,
    trimBlocks: true,
    lstripBlocks: true,
    tags: TEMPLATE_TAGS,
  });
  const name = path.basename(resolved);

  return {
    templatePath: resolved,
    render(context: TypesetContext): string {
      try {
        return env.render(name, context);
      } catch (err) {
        throw new TemplateError(`Failed to render ${name}`, resolved, toError(err));
      }
    },
  };
}

/**
 * Render a topic document through a template
 */
export function renderTypeset(
  document: unknown,
  template: TypesetTemplate,
  logger: Logger = defaultLogger
): string {
  return template.render(buildTypesetContext(document, logger));
}
