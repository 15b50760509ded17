/**
 * Topic Parser
 *
 * Decodes a parsed YAML topic document into the Topic model.
 * Missing fields are defaulted here so that nothing downstream has to deal
 * with absent values. Wrong primitive types (a non-numeric chart value, a
 * slide that is not a mapping) raise ContentDecodeError.
 *
 * Source field names are the document's own:
 *   tema, subtitulo, diapositivas[].titulo, diapositivas[].contenido[]
 * Content items are bare strings or mappings tagged by `tipo`.
 */

import * as fs from 'fs';

import * as yaml from 'js-yaml';
import { z } from 'zod';

import { ContentDecodeError } from '../errors';
import { defaultLogger, Logger } from '../logging/console-logger';
import {
  ContentItem,
  DEFAULT_SERIES_NAME,
  EmphasisKind,
  Slide,
  Topic,
  UNTITLED,
} from '../models/topic.model';

/**
 * `tipo` values that map to emphasis blocks
 */
export const EMPHASIS_TAGS: Record<string, EmphasisKind> = {
  nota: 'note',
  ejemplo: 'example',
  problema: 'problem',
  formula: 'formula',
  calculo: 'computation',
};

export function emphasisKindForTag(tag: string): EmphasisKind | undefined {
  return Object.prototype.hasOwnProperty.call(EMPHASIS_TAGS, tag) ? EMPHASIS_TAGS[tag] : undefined;
}

const nullToUndefined = (value: unknown): unknown => (value === null ? undefined : value);

const displayString = z
  .union([z.string(), z.number(), z.boolean()])
  .transform(value => String(value));

const tableCell = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .transform(value => (value === null ? '' : String(value)));

const text = (fallback: string) => z.preprocess(nullToUndefined, displayString.default(fallback));

const stringList = z.preprocess(nullToUndefined, z.array(displayString).default([]));

const numberList = z.preprocess(nullToUndefined, z.array(z.number()).default([]));

const emphasisFields = z.object({
  texto: text(''),
});

const componentsFields = z.object({
  lista: stringList,
});

const solutionFields = z.object({
  pasos: stringList,
});

const tableFields = z.object({
  encabezados: stringList,
  filas: z.preprocess(nullToUndefined, z.array(z.array(tableCell)).default([])),
});

const axisFields = {
  etiqueta_x: text(''),
  etiqueta_y: text(''),
  titulo_serie: text(DEFAULT_SERIES_NAME),
};

const barChartFields = z.object({
  categorias: stringList,
  valores: numberList,
  ...axisFields,
});

const lineChartFields = z.object({
  datos_x: z.preprocess(nullToUndefined, z.array(z.union([z.string(), z.number()])).default([])),
  datos_y: numberList,
  ...axisFields,
});

const pieChartFields = z.object({
  etiquetas: stringList,
  valores: numberList,
});

const topicFields = z.object({
  tema: text(UNTITLED),
  subtitulo: text(''),
  diapositivas: z.preprocess(nullToUndefined, z.array(z.unknown()).default([])),
});

const slideFields = z.object({
  titulo: text(UNTITLED),
  contenido: z.preprocess(nullToUndefined, z.array(z.unknown()).default([])),
});

/**
 * Render a zod issue path after a base location
 */
function joinPath(base: string, segments: (string | number)[]): string {
  return segments.reduce<string>(
    (acc, segment) =>
      typeof segment === 'number' ? `${acc}[${segment}]` : acc ? `${acc}.${segment}` : segment,
    base
  );
}

function parseFields<T extends z.ZodTypeAny>(schema: T, raw: unknown, path: string): z.output<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ContentDecodeError(issue.message, joinPath(path, issue.path));
  }
  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode one entry of a slide's `contenido` list.
 * Returns undefined for entries that carry nothing drawable.
 */
export function decodeContentItem(
  raw: unknown,
  path: string,
  logger: Logger = defaultLogger
): ContentItem | undefined {
  if (typeof raw === 'string') {
    return { type: 'text', text: raw };
  }
  if (typeof raw === 'number' || typeof raw === 'boolean') {
    return { type: 'text', text: String(raw) };
  }
  if (raw === null || raw === undefined) {
    logger.warn('Skipping empty content item', { path });
    return undefined;
  }
  if (!isRecord(raw)) {
    throw new ContentDecodeError('Content item must be a string or a mapping', path);
  }

  const tag = typeof raw.tipo === 'string' ? raw.tipo : '';

  const kind = emphasisKindForTag(tag);
  if (kind) {
    const fields = parseFields(emphasisFields, raw, path);
    return { type: 'emphasis', kind, text: fields.texto };
  }

  switch (tag) {
    case 'componentes': {
      const fields = parseFields(componentsFields, raw, path);
      return { type: 'components', items: fields.lista };
    }
    case 'solucion': {
      const fields = parseFields(solutionFields, raw, path);
      return { type: 'solution', steps: fields.pasos };
    }
    case 'tabla': {
      const fields = parseFields(tableFields, raw, path);
      return { type: 'table', headers: fields.encabezados, rows: fields.filas };
    }
    case 'grafico_barras': {
      const fields = parseFields(barChartFields, raw, path);
      return {
        type: 'bar-chart',
        categories: fields.categorias,
        values: fields.valores,
        xLabel: fields.etiqueta_x,
        yLabel: fields.etiqueta_y,
        seriesName: fields.titulo_serie,
      };
    }
    case 'grafico_lineas': {
      const fields = parseFields(lineChartFields, raw, path);
      return {
        type: 'line-chart',
        xValues: fields.datos_x,
        yValues: fields.datos_y,
        xLabel: fields.etiqueta_x,
        yLabel: fields.etiqueta_y,
        seriesName: fields.titulo_serie,
      };
    }
    case 'grafico_circular': {
      const fields = parseFields(pieChartFields, raw, path);
      return { type: 'pie-chart', labels: fields.etiquetas, values: fields.valores };
    }
    default: {
      const fields = parseFields(emphasisFields, raw, path);
      if (!fields.texto) {
        logger.warn(`Skipping content item with unsupported tipo "${tag}"`, { path });
        return undefined;
      }
      logger.debug(`Unsupported tipo "${tag}", drawing with the default marker`, { path });
      return { type: 'unrecognized', tag, text: fields.texto };
    }
  }
}

/**
 * Decode one entry of `diapositivas`
 */
export function decodeSlide(raw: unknown, path: string, logger: Logger = defaultLogger): Slide {
  if (!isRecord(raw)) {
    throw new ContentDecodeError('Slide must be a mapping', path);
  }
  const fields = parseFields(slideFields, raw, path);
  const content: ContentItem[] = [];

  fields.contenido.forEach((entry, index) => {
    const item = decodeContentItem(entry, `${path}.contenido[${index}]`, logger);
    if (item) {
      content.push(item);
    }
  });

  return { title: fields.titulo, content };
}

/**
 * Decode a whole topic document
 */
export function decodeTopic(raw: unknown, logger: Logger = defaultLogger): Topic {
  if (raw === null || raw === undefined) {
    return { title: UNTITLED, slides: [] };
  }
  if (!isRecord(raw)) {
    throw new ContentDecodeError('Topic document must be a mapping', '');
  }

  const fields = parseFields(topicFields, raw, '');
  const slides = fields.diapositivas.map((entry, index) =>
    decodeSlide(entry, `diapositivas[${index}]`, logger)
  );

  return {
    title: fields.tema,
    subtitle: fields.subtitulo || undefined,
    slides,
  };
}

/**
 * Parse YAML text into the raw document tree
 */
export function parseTopicYaml(source: string, fileName?: string): unknown {
  return yaml.load(source, { filename: fileName });
}

/**
 * Read and parse a topic YAML file (without decoding)
 */
export function loadTopicDocument(filePath: string): unknown {
  const source = fs.readFileSync(filePath, 'utf-8');
  return parseTopicYaml(source, filePath);
}

/**
 * Read, parse and decode a topic YAML file
 */
export function loadTopicFile(filePath: string, logger: Logger = defaultLogger): Topic {
  return decodeTopic(loadTopicDocument(filePath), logger);
}
