import path from 'path';
import fs from 'fs/promises';
import type { Cascade } from '../dependency-resolver';
import { createComponentLogger } from '../../utils/logger';
import { RenderBackendError } from '../../utils/errors';
import { buildCascadeGraph } from './cascade-graph-builder';
import { toDot } from './dot-writer';
import type { GraphRenderer } from './types';

const logger = createComponentLogger('graph-exporter');

export interface ExportGraphOptions {
  outputDir: string;
  format: string;
  renderer: GraphRenderer;
}

// Quoted identifiers may contain path separators; keep the file inside outputDir
function fileNamePart(value: string): string {
  return value.replace(/[/\\\0]/g, '_');
}

export function graphOutputPath(outputDir: string, cascade: Cascade, format: string): string {
  const { schema, name } = cascade.root;
  return path.join(
    outputDir,
    `${fileNamePart(schema)}.${fileNamePart(name)}.${fileNamePart(format)}`
  );
}

/**
 * Render the cascade graph to `<outputDir>/<schema>.<root>.<format>` and
 * return that path.
 */
export async function exportCascadeGraph(
  cascade: Cascade,
  options: ExportGraphOptions
): Promise<string> {
  const outputPath = graphOutputPath(options.outputDir, cascade, options.format);
  const graph = buildCascadeGraph(cascade);

  try {
    await fs.mkdir(options.outputDir, { recursive: true });
  } catch (error) {
    throw new RenderBackendError(options.format, outputPath, error);
  }

  logger.debug('Rendering cascade graph', {
    outputPath,
    nodes: graph.nodes.length,
    edges: graph.edges.length,
  });

  try {
    await options.renderer.render(toDot(graph), outputPath, options.format);
  } catch (error) {
    if (error instanceof RenderBackendError) {
      throw error;
    }
    throw new RenderBackendError(options.format, outputPath, error);
  }

  return outputPath;
}
