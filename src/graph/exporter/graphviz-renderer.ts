import { execFile } from 'child_process';
import { promisify } from 'util';
import fs from 'fs/promises';
import { createComponentLogger } from '../../utils/logger';
import { RenderBackendError } from '../../utils/errors';
import type { GraphRenderer } from './types';

const execFileAsync = promisify(execFile);
const logger = createComponentLogger('graph-exporter');

export interface GraphvizRendererOptions {
  dotPath?: string;
  keepSource?: boolean;
  timeoutMs?: number;
}

/**
 * Renders through the Graphviz `dot` binary. The DOT source is written next to
 * the output file and removed afterwards unless `keepSource` is set.
 */
export class GraphvizRenderer implements GraphRenderer {
  private readonly dotPath: string;
  private readonly keepSource: boolean;
  private readonly timeoutMs: number;

  constructor(options: GraphvizRendererOptions = {}) {
    this.dotPath = options.dotPath ?? 'dot';
    this.keepSource = options.keepSource ?? false;
    this.timeoutMs = options.timeoutMs ?? 60000;
  }

  async render(dotSource: string, outputPath: string, format: string): Promise<void> {
    const sourcePath = `${outputPath}.gv`;

    try {
      await fs.writeFile(sourcePath, dotSource, 'utf-8');
      await execFileAsync(this.dotPath, [`-T${format}`, '-o', outputPath, sourcePath], {
        timeout: this.timeoutMs,
      });
      logger.debug('Graph rendered', { outputPath, format });
    } catch (error) {
      throw new RenderBackendError(format, outputPath, error);
    } finally {
      if (!this.keepSource) {
        await fs.rm(sourcePath, { force: true });
      }
    }
  }
}
