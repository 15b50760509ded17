/**
 * Presentation Pipeline Service Tests
 *
 * Runs the fixture documents through the pipeline with a recording
 * presentation in place of pptxgenjs.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { Logger } from '../logging/console-logger';
import { PresentationDocument, PresentationSlide } from '../output/pptx-backend';
import { runPresentationBatch } from './presentation-pipeline.service';

const CONTENT_ROOT = path.resolve(__dirname, '../../fixtures/clases');

function createMockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

function createFakePresentation(slides: PresentationSlide[]): PresentationDocument {
  return {
    layout: '',
    title: '',
    defineLayout: jest.fn(),
    addSlide: () => {
      const slide: PresentationSlide = {
        addText: jest.fn(),
        addShape: jest.fn(),
        addTable: jest.fn(),
        addChart: jest.fn(),
      };
      slides.push(slide);
      return slide;
    },
    write: jest.fn().mockResolvedValue(new Uint8Array([0x50, 0x4b])),
  };
}

describe('presentation-pipeline.service', () => {
  let outputDir: string;
  let logger: jest.Mocked<Logger>;
  let slides: PresentationSlide[];

  beforeEach(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'presentation-pipeline-'));
    logger = createMockLogger();
    slides = [];
  });

  afterEach(() => {
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  describe('runPresentationBatch', () => {
    it('should convert every document under the content root and isolate failures', async () => {
      const result = await runPresentationBatch({
        inputs: [],
        outputDir,
        contentRoot: CONTENT_ROOT,
        logger,
        createPresentation: () => createFakePresentation(slides),
      });

      expect(result.totalFiles).toBe(2);
      expect(result.processed).toBe(1);
      expect(result.failed).toBe(1);

      const [generated, failed] = result.results;
      const destination = path.join(outputDir, 'estadistica', 'introduccion.pptx');
      expect(generated.status).toBe('generated');
      expect(generated.sourcePath).toBe(path.join(CONTENT_ROOT, 'estadistica', 'introduccion.yml'));
      expect(generated.outputs).toEqual([destination]);
      expect([...fs.readFileSync(destination)]).toEqual([0x50, 0x4b]);

      expect(failed.status).toBe('error');
      expect(failed.outputs).toEqual([]);
      expect(failed.error).toContain('(at diapositivas[0].contenido[0].valores[1])');
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it('should draw the cover and one slide per topic slide', async () => {
      await runPresentationBatch({
        inputs: ['estadistica/introduccion.yml'],
        cwd: CONTENT_ROOT,
        outputDir,
        contentRoot: CONTENT_ROOT,
        logger,
        createPresentation: () => createFakePresentation(slides),
      });

      expect(slides).toHaveLength(4);
      expect(slides[0].background).toEqual({ color: '2980B9' });
      expect(slides[2].addTable).toHaveBeenCalledTimes(1);
      expect(slides[3].addChart).toHaveBeenCalledWith(
        'bar',
        [{ name: 'Serie', labels: ['Rojo', 'Azul', 'Verde'], values: [4, 6, 2] }],
        expect.objectContaining({ catAxisTitle: 'Color', valAxisTitle: 'Estudiantes' })
      );
    });

    it('should warn about missing files and convert nothing for them', async () => {
      const result = await runPresentationBatch({
        inputs: ['no-existe.yml'],
        cwd: CONTENT_ROOT,
        outputDir,
        contentRoot: CONTENT_ROOT,
        logger,
        createPresentation: () => createFakePresentation(slides),
      });

      expect(result.totalFiles).toBe(0);
      expect(result.missing).toEqual([path.join(CONTENT_ROOT, 'no-existe.yml')]);
      expect(logger.warn).toHaveBeenCalledWith(`Not found: ${path.join(CONTENT_ROOT, 'no-existe.yml')}`);
    });
  });
});
