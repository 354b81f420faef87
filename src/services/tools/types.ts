// Tool system types and interfaces
// Every tool is one variant of a closed union sharing a single invoke() capability

export type ArgValue = string | number | boolean;
export type ToolArgs = Record<string, ArgValue>;

export type ToolKind = 'retrieval' | 'structured-data' | 'generation' | 'notification';

// Drives answer grouping: policy → rule information, data → data information
export type ToolCategory = 'policy' | 'data' | 'action' | 'generation';

// Drives retry safety. Only read and idempotent-by-key calls are ever repeated.
export type ToolEffect = 'read' | 'idempotent' | 'mutating';

export enum FailureKind {
  PARAMETER_INVALID = 'ParameterInvalid',
  ENTITY_NOT_FOUND = 'EntityNotFound',
  DEPENDENCY_UNSATISFIABLE = 'DependencyUnsatisfiable',
  TRANSIENT = 'Transient',
  EXTERNAL_MUTATION_UNCERTAIN = 'ExternalMutationUncertain',
  INTERNAL_FAULT = 'InternalFault',
}

export interface FailureDetail {
  kind: FailureKind;
  message: string;
  context?: Record<string, ArgValue>;
  /** Set when the step never ran because a step it references did not succeed. */
  blockedBy?: string;
}

export interface ToolParameter {
  name: string;
  type: 'string' | 'number' | 'boolean';
  description: string;
  required: boolean;
  enum?: string[];
  default?: ArgValue;
  /** Export name that supplies this parameter when it differs from `name`. */
  imports?: string;
  /** Marks the entity the call acts on. Repair rules never rewrite it. */
  target?: boolean;
}

export interface ToolSpec {
  name: string;
  description: string;
  kind: ToolKind;
  category: ToolCategory;
  effect: ToolEffect;
  parameters: ToolParameter[];
  exports: string[];
  /** At least one of these optional parameters must be bound before the tool can run. */
  requiresOneOf?: string[];
}

export interface SourceAttribution {
  origin: string;
  excerpt: string;
  score?: number;
}

export interface ToolSuccess {
  success: true;
  content: string; // human-readable excerpt used in the answer
  data: unknown;
  exports: Record<string, ArgValue>;
  source?: SourceAttribution;
}

export interface ToolFailure {
  success: false;
  error: FailureDetail;
}

export type ToolResult = ToolSuccess | ToolFailure;

export interface ToolContext {
  signal: AbortSignal;
}

interface ToolVariant<K extends ToolKind> extends ToolSpec {
  kind: K;
  invoke(args: ToolArgs, context: ToolContext): Promise<ToolResult>;
}

export type RetrievalTool = ToolVariant<'retrieval'>;
export type StructuredDataTool = ToolVariant<'structured-data'>;
export type GenerationTool = ToolVariant<'generation'>;
export type NotificationTool = ToolVariant<'notification'>;

export type ToolDefinition = RetrievalTool | StructuredDataTool | GenerationTool | NotificationTool;

export function requiredParameters(tool: ToolSpec): ToolParameter[] {
  return tool.parameters.filter(p => p.required);
}

export function exportSupplying(param: ToolParameter): string {
  return param.imports ?? param.name;
}
