import { Type, type Static, type TObject, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { ParseResult } from "./overrides.js";
import type { ActionResult } from "./types.js";

function stringEnum<const T extends readonly string[]>(
  values: T,
  options: { description?: string } = {},
) {
  return Type.Union(
    values.map((value: T[number]) => Type.Literal(value)),
    options,
  );
}

export const CONTROLLER_ACTIONS = ["show-current-config", "drain", "resume"] as const;
export const COMPUTE_ACTIONS = ["node-configured", "node-config", "show-nhc-config"] as const;

export type ControllerAction = (typeof CONTROLLER_ACTIONS)[number];
export type ComputeAction = (typeof COMPUTE_ACTIONS)[number];

export const ControllerActionSchema = Type.Object({
  action: stringEnum(CONTROLLER_ACTIONS, {
    description: `Action to perform: ${CONTROLLER_ACTIONS.join(", ")}`,
  }),
});

export const ComputeActionSchema = Type.Object({
  action: stringEnum(COMPUTE_ACTIONS, {
    description: `Action to perform: ${COMPUTE_ACTIONS.join(", ")}`,
  }),
});

export const NoParamsSchema = Type.Object({}, { additionalProperties: false });

export const DrainParamsSchema = Type.Object(
  {
    nodename: Type.String({ minLength: 1, description: "Comma-separated node names" }),
    reason: Type.String({ minLength: 1, description: "Why the nodes are drained" }),
  },
  { additionalProperties: false },
);
export type DrainParams = Static<typeof DrainParamsSchema>;

export const ResumeParamsSchema = Type.Object(
  {
    nodename: Type.String({ minLength: 1, description: "Comma-separated node names" }),
  },
  { additionalProperties: false },
);
export type ResumeParams = Static<typeof ResumeParamsSchema>;

export const NodeConfigParamsSchema = Type.Object(
  {
    parameters: Type.Optional(
      Type.String({ description: "Whitespace-separated KEY=VALUE node parameters" }),
    ),
  },
  { additionalProperties: false },
);
export type NodeConfigParams = Static<typeof NodeConfigParamsSchema>;

function firstError(schema: TSchema, value: unknown): string {
  const error = Value.Errors(schema, value).First();
  return error ? `${error.path || "/"}: ${error.message}` : "invalid";
}

export function parseActionParams<S extends TObject>(
  schema: S,
  raw: unknown,
): ParseResult<Static<S>> {
  const value: unknown = Value.Default(schema, raw ?? {});
  if (!Value.Check(schema, value)) {
    return { ok: false, error: firstError(schema, value) };
  }
  return { ok: true, value };
}

export function parseActionName<S extends TObject>(schema: S, action: string): ParseResult<Static<S>> {
  return parseActionParams(schema, { action });
}

export function completed(results: Record<string, string> = {}): ActionResult {
  return { status: "completed", results };
}

export function failed(message: string, results: Record<string, string> = {}): ActionResult {
  return { status: "failed", message, results };
}
