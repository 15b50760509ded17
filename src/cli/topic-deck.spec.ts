/**
 * Topic Deck CLI Tests
 *
 * Argument parsing and option defaults, with the handlers mocked out.
 */

import { DEFAULT_TEMPLATE_PATH } from '../typeset/template-renderer';
import { handleLatex, handlePptx } from './handlers/deck-handlers';
import { ServiceContainer } from './service-container';
import { createProgram } from './topic-deck';

jest.mock('./handlers/deck-handlers');

const mockHandlePptx = handlePptx as jest.MockedFunction<typeof handlePptx>;
const mockHandleLatex = handleLatex as jest.MockedFunction<typeof handleLatex>;

describe('topic-deck CLI', () => {
  const container = new ServiceContainer({
    console: { log: jest.fn(), error: jest.fn() },
    process: { exit: jest.fn<never, [number?]>(), cwd: () => '/work' },
  });

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should apply the pptx defaults', async () => {
    await createProgram(container).parseAsync(['node', 'topic-deck', 'pptx']);

    expect(mockHandlePptx).toHaveBeenCalledWith(
      { files: [], output: './pptx', root: './clases', verbose: false },
      container
    );
  });

  it('should pass pptx files and options', async () => {
    await createProgram(container).parseAsync([
      'node',
      'topic-deck',
      'pptx',
      'a.yml',
      'b.yml',
      '-o',
      'salida',
      '--root',
      'temas',
      '-v',
    ]);

    expect(mockHandlePptx).toHaveBeenCalledWith(
      { files: ['a.yml', 'b.yml'], output: 'salida', root: 'temas', verbose: true },
      container
    );
  });

  it('should apply the latex defaults', async () => {
    await createProgram(container).parseAsync(['node', 'topic-deck', 'latex']);

    expect(mockHandleLatex).toHaveBeenCalledWith(
      {
        files: [],
        output: './slides',
        pdfDir: './pdfs',
        template: DEFAULT_TEMPLATE_PATH,
        root: './clases',
        compile: true,
        verbose: false,
      },
      container
    );
  });

  it('should turn compilation off with --no-compile', async () => {
    await createProgram(container).parseAsync([
      'node',
      'topic-deck',
      'latex',
      'x.yml',
      '--no-compile',
      '-t',
      'mi_plantilla.tex.njk',
      '-p',
      'pdf',
    ]);

    expect(mockHandleLatex).toHaveBeenCalledWith(
      expect.objectContaining({
        files: ['x.yml'],
        compile: false,
        template: 'mi_plantilla.tex.njk',
        pdfDir: 'pdf',
      }),
      container
    );
  });
});
