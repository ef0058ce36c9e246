import { z } from "zod";
import { DEFAULT_LIMITS } from "./types";

export const providerSchema = z.object({
  // Defaults to the provider's key
  name: z.string().min(1).optional(),
  baseUrl: z.string().url(),
  credentialEnvKey: z.string().min(1).optional(),
  wireApi: z.enum(["chat", "responses", "gemini"]),
  streaming: z.boolean().default(true),
  authStyle: z.enum(["bearer", "x-goog-api-key"]).optional(),
  headers: z.record(z.string()).optional(),
  queryParams: z.record(z.string()).optional(),
  streamIdleTimeoutMs: z.number().int().positive().optional(),
});

export const modelFamilySchema = z
  .object({
    id: z.string().min(1),
    prefixes: z.array(z.string().min(1)).optional(),
    pattern: z.string().min(1).optional(),
    shellType: z.enum(["shell_command", "exec"]),
    applyPatchToolType: z.enum(["freeform", "structured"]),
    supportsParallelToolCalls: z.boolean().default(false),
    thoughtSignatures: z.enum(["none", "preserve", "required"]).default("none"),
    signatureVendor: z.string().min(1).optional(),
    baseInstructions: z.string().default(""),
  })
  .refine((f) => (f.prefixes?.length ?? 0) > 0 || f.pattern !== undefined, {
    message: "a model family needs prefixes or a pattern",
  });

export const configFileSchema = z.object({
  model: z.string().min(1),
  modelProvider: z.string().min(1).default("openai"),
  providers: z.record(providerSchema).default({}),
  modelFamilies: z.array(modelFamilySchema).default([]),
  limits: z
    .object({
      maxArgumentBytes: z.number().int().positive().default(DEFAULT_LIMITS.maxArgumentBytes),
      maxEventBytes: z.number().int().positive().default(DEFAULT_LIMITS.maxEventBytes),
    })
    .default({}),
  thoughtSignatures: z
    .object({
      onMissing: z.enum(["error", "omit", "bypass"]).default("error"),
    })
    .default({}),
  logging: z
    .object({
      dir: z.string().min(1).optional(),
      enabled: z.boolean().optional(),
      debugEnabled: z.boolean().optional(),
    })
    .optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
