/**
 * Service Container - Dependency Injection Container
 *
 * Provides the console, process and pipeline services the command handlers
 * use. Tests pass fakes for any of them.
 */

import { BatchResult, PresentationBatchOptions, TypesetBatchOptions } from '../models/batch.model';
import { runPresentationBatch } from '../services/presentation-pipeline.service';
import { runTypesetBatch } from '../services/typeset-pipeline.service';

/**
 * Console operations interface (for testability)
 */
export interface IConsole {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Process operations interface (for testability)
 */
export interface IProcess {
  exit(code?: number): never;
  cwd(): string;
}

export interface IPresentationPipelineService {
  runPresentationBatch(options: PresentationBatchOptions): Promise<BatchResult>;
}

export interface ITypesetPipelineService {
  runTypesetBatch(options: TypesetBatchOptions): Promise<BatchResult>;
}

/**
 * Service container configuration
 */
export interface ServiceContainerConfig {
  console?: IConsole;
  process?: IProcess;
  presentationPipeline?: IPresentationPipelineService;
  typesetPipeline?: ITypesetPipelineService;
}

/**
 * Service container - manages all service dependencies
 */
export class ServiceContainer {
  public readonly console: IConsole;
  public readonly process: IProcess;
  public readonly presentationPipeline: IPresentationPipelineService;
  public readonly typesetPipeline: ITypesetPipelineService;

  constructor(config: ServiceContainerConfig = {}) {
    // Use provided implementations or fall back to real implementations
    this.console = config.console || this.createRealConsole();
    this.process = config.process || this.createRealProcess();
    this.presentationPipeline = config.presentationPipeline || { runPresentationBatch };
    this.typesetPipeline = config.typesetPipeline || { runTypesetBatch };
  }

  // Private factory methods for real implementations

  private createRealConsole(): IConsole {
    return {
      log: console.log.bind(console),
      error: console.error.bind(console),
    };
  }

  private createRealProcess(): IProcess {
    return {
      exit: (code?: number): never => process.exit(code),
      cwd: () => process.cwd(),
    };
  }
}
