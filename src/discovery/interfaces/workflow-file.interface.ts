export interface WorkflowNode {
  name: string;
  type: string;
  position: [number, number];
  parameters?: Record<string, unknown>;
  typeVersion: number;
}

export interface WorkflowData {
  name: string;
  nodes: WorkflowNode[];
  connections?: Record<string, unknown>;
  active?: boolean;
}

export interface WorkflowFile {
  path: string;
  relativePath: string;
  name: string;
  valid: boolean;
  error?: string;
  nodeCount: number;
}

export interface ScanSummary {
  totalFiles: number;
  validWorkflows: number;
  invalidWorkflows: number;
  totalNodes: number;
}

export type WorkflowValidation =
  | { valid: true; workflow: WorkflowData }
  | { valid: false; error: string };
