import type { ObjectKind } from '../../database/models';

export interface NodeStyle {
  style: string;
  color: string;
}

export interface GraphNode {
  id: string;
  kind: ObjectKind;
  style: NodeStyle;
}

export interface GraphEdge {
  from: string;
  to: string;
  label?: string;
}

export interface GraphDescription {
  name: string;
  nodes: GraphNode[];
  edges: GraphEdge[];
}

/**
 * Rendering backend turning DOT source into an image file.
 */
export interface GraphRenderer {
  render(dotSource: string, outputPath: string, format: string): Promise<void>;
}
