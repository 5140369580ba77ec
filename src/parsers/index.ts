import { z } from 'zod';
import * as yaml from 'yaml';
import { readFileSync, existsSync } from 'fs';
import { ConfigError, errorMessage } from '../utils/errors.js';

export const DEFAULT_PIPELINE_FILE = '.qgate/quality.yaml';
export const FILES_PLACEHOLDER = '{files}';

export type ParsingStrategy = 'exit_code' | 'json_field' | 'text_regex';
export type SuccessMode = 'exit_code' | 'json_field' | 'regex';

// Which success modes can read what each parsing strategy produces
export const COMPATIBLE_SUCCESS_MODES: Record<ParsingStrategy, readonly SuccessMode[]> = {
  exit_code: ['exit_code'],
  json_field: ['json_field', 'exit_code'],
  text_regex: ['regex', 'exit_code'],
};

const REGEX_FLAGS = { IGNORECASE: 'i', MULTILINE: 'm', DOTALL: 's' } as const;
export type RegexFlag = keyof typeof REGEX_FLAGS;

export function isJsonPointer(pointer: string): boolean {
  return pointer === '' || pointer.startsWith('/');
}

const JsonPointerSchema = z.string().refine(isJsonPointer, {
  message: "Invalid JSON Pointer, must be '' or start with '/' (RFC 6901)",
});

const ExecutionSchema = z.object({
  command: z.array(z.string().min(1), { required_error: 'execution.command is required' })
    .min(1, 'execution.command must list at least the executable')
    .refine(command => command[0] !== FILES_PLACEHOLDER, {
      message: `execution.command must start with the executable, not ${FILES_PLACEHOLDER}`,
    }),
  timeout_seconds: z.number().positive(),
  working_dir: z.string().optional(),
}).strict();

const ExitCodeParsingSchema = z.object({
  strategy: z.literal('exit_code'),
}).strict();

const JsonFieldParsingSchema = z.object({
  strategy: z.literal('json_field'),
  field_pointers: z.record(JsonPointerSchema).refine(fields => Object.keys(fields).length > 0, {
    message: 'json_field parsing needs at least one field pointer',
  }),
  diagnostics_path: JsonPointerSchema.optional(),
  field_map: z.record(z.string().min(1)).optional(), // Issue field -> key path inside each diagnostic
}).strict();

const TextRegexParsingSchema = z.object({
  strategy: z.literal('text_regex'),
  regex: z.string().min(1),
  flags: z.array(z.enum(['IGNORECASE', 'MULTILINE', 'DOTALL'])).default([]),
  defaults: z.record(z.string()).default({}),
}).strict();

const ParsingSchema = z.discriminatedUnion('strategy', [
  ExitCodeParsingSchema,
  JsonFieldParsingSchema,
  TextRegexParsingSchema,
]);

const SuccessSchema = z.object({
  mode: z.enum(['exit_code', 'json_field', 'regex']),
  exit_codes_ok: z.array(z.number().int()).min(1).default([0]),
  max_errors: z.number().int().nonnegative().optional(),
  require_no_issues: z.boolean().optional(),
}).strict();

const CapabilitiesSchema = z.object({
  file_types: z.array(z.string().min(1)).min(1),
  supports_autofix: z.boolean().default(false),
  produces_json: z.boolean().default(false),
}).strict();

const GlobScopeSchema = z.object({
  include_globs: z.array(z.string().min(1)).default([]),
  exclude_globs: z.array(z.string().min(1)).default([]),
}).strict();

const GateSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  category: z.enum(['static', 'tests']).default('static'),
  execution: ExecutionSchema,
  parsing: ParsingSchema,
  success: SuccessSchema,
  capabilities: CapabilitiesSchema,
  scope: GlobScopeSchema.optional(),
  hints: z.array(z.string()).default([]),
}).strict().superRefine((gate, ctx) => {
  const allowed = COMPATIBLE_SUCCESS_MODES[gate.parsing.strategy];
  if (!allowed.includes(gate.success.mode)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['success', 'mode'],
      message: `success.mode "${gate.success.mode}" is incompatible with parsing.strategy "${gate.parsing.strategy}" (allowed: ${allowed.join(', ')})`,
    });
  }

  if (gate.parsing.strategy === 'text_regex') {
    try {
      compileIssuePattern(gate.parsing.regex, gate.parsing.flags);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['parsing', 'regex'],
        message: `Invalid regex: ${errorMessage(error)}`,
      });
    }
  }
});

const ArtifactLoggingSchema = z.object({
  enabled: z.boolean().default(true),
  output_dir: z.string().min(1).default('temp/qa_logs'),
  max_files: z.number().int().positive().default(200),
}).strict();

const PipelineSchema = z.object({
  version: z.union([z.string(), z.number()]).transform(String),
  active_gates: z.array(z.string().min(1)).min(1, 'active_gates must list at least one gate'),
  gates: z.record(GateSchema),
  artifact_logging: ArtifactLoggingSchema.default({}),
  project_scope: GlobScopeSchema.default({}),
}).strict().superRefine((pipeline, ctx) => {
  const seen = new Set<string>();
  pipeline.active_gates.forEach((id, index) => {
    if (seen.has(id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['active_gates', index], message: `Duplicate active gate "${id}"` });
    }
    seen.add(id);
    if (!Object.hasOwn(pipeline.gates, id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['active_gates', index], message: `Active gate "${id}" is not defined under gates` });
    }
  });
});

export type GateConfig = z.infer<typeof GateSchema>;
export type GateParsing = GateConfig['parsing'];
export type JsonFieldParsing = z.infer<typeof JsonFieldParsingSchema>;
export type TextRegexParsing = z.infer<typeof TextRegexParsingSchema>;
export type SuccessSpec = GateConfig['success'];
export type GateCapabilities = GateConfig['capabilities'];
export type GlobScope = z.infer<typeof GlobScopeSchema>;
export type ArtifactLoggingConfig = z.infer<typeof ArtifactLoggingSchema>;
export type GateCategory = GateConfig['category'];

export interface GateDefinition extends GateConfig {
  id: string;
}

export interface Pipeline {
  version: string;
  gates: Record<string, GateDefinition>;
  /** Active gates in execution order. */
  active: GateDefinition[];
  artifact_logging: ArtifactLoggingConfig;
  project_scope: GlobScope;
}

/**
 * Compiles a text_regex pattern. Named groups written `(?P<name>...)`
 * are accepted and rewritten to the JavaScript form.
 */
export function compileIssuePattern(source: string, flags: RegexFlag[] = []): RegExp {
  const jsSource = source.replace(/\(\?P</g, '(?<');
  return new RegExp(jsSource, flags.map(f => REGEX_FLAGS[f]).join(''));
}

function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map(i => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`);
}

export function parsePipeline(raw: unknown): Pipeline {
  const result = PipelineSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError('Invalid quality gate configuration:', formatZodIssues(result.error));
  }

  const validated = result.data;
  const gates: Record<string, GateDefinition> = {};
  for (const [id, gate] of Object.entries(validated.gates)) {
    gates[id] = { ...gate, id };
  }

  return {
    version: validated.version,
    gates,
    active: validated.active_gates.map(id => gates[id]),
    artifact_logging: validated.artifact_logging,
    project_scope: validated.project_scope,
  };
}

export function loadPipeline(filePath: string): Pipeline {
  if (!existsSync(filePath)) {
    throw new ConfigError(`Quality config not found: ${filePath}`, [
      `Expected location: ${DEFAULT_PIPELINE_FILE}`,
      'Run `qgate init` to create a starter pipeline',
    ]);
  }

  const content = readFileSync(filePath, 'utf-8');
  const isJson = filePath.endsWith('.json');
  let raw: unknown;
  try {
    raw = isJson ? JSON.parse(content) : yaml.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse quality config ${filePath}: ${errorMessage(error)}`);
  }

  return parsePipeline(raw);
}

export function validatePipelineFile(filePath: string): { valid: boolean; errors: string[] } {
  try {
    loadPipeline(filePath);
    return { valid: true, errors: [] };
  } catch (error) {
    if (error instanceof ConfigError && error.problems.length > 0) {
      return { valid: false, errors: error.problems };
    }
    return { valid: false, errors: [errorMessage(error)] };
  }
}

/** Starter pipeline written by `qgate init`. */
export function generateDefaultPipeline(): string {
  const template = {
    version: '1',
    active_gates: ['format', 'lint', 'types', 'tests'],
    artifact_logging: { enabled: true, output_dir: 'temp/qa_logs', max_files: 200 },
    project_scope: { include_globs: ['src/**/*.py', 'tests/**/*.py'], exclude_globs: [] },
    gates: {
      format: {
        name: 'Ruff Format',
        description: 'Formatting check',
        execution: { command: ['ruff', 'format', '--check', '{files}'], timeout_seconds: 60 },
        parsing: { strategy: 'exit_code' },
        success: { mode: 'exit_code', exit_codes_ok: [0] },
        capabilities: { file_types: ['.py'], supports_autofix: true, produces_json: false },
        hints: ['To apply formatting run the same command without --check'],
      },
      lint: {
        name: 'Ruff Lint',
        description: 'Lint rules, reported as JSON',
        execution: { command: ['ruff', 'check', '--output-format=json', '{files}'], timeout_seconds: 60 },
        parsing: { strategy: 'exit_code' },
        success: { mode: 'exit_code', exit_codes_ok: [0] },
        capabilities: { file_types: ['.py'], supports_autofix: true, produces_json: true },
      },
      types: {
        name: 'Pyright',
        description: 'Static type check',
        execution: { command: ['pyright', '--outputjson', '{files}'], timeout_seconds: 120 },
        parsing: {
          strategy: 'json_field',
          field_pointers: { error_count: '/summary/errorCount' },
          diagnostics_path: '/generalDiagnostics',
        },
        success: { mode: 'json_field', max_errors: 0 },
        capabilities: { file_types: ['.py'], supports_autofix: false, produces_json: true },
      },
      tests: {
        name: 'Pytest',
        description: 'Unit tests',
        category: 'tests',
        execution: { command: ['pytest', 'tests', '-q'], timeout_seconds: 600 },
        parsing: { strategy: 'exit_code' },
        success: { mode: 'exit_code', exit_codes_ok: [0] },
        capabilities: { file_types: ['.py'], supports_autofix: false, produces_json: false },
      },
    },
  };
  return yaml.stringify(template);
}
