import { z } from "zod";

export const PresetSchema = z.object({
	jobs: z.array(z.string()).default([]),
	event: z
		.object({
			name: z.string(),
			branch: z.string().optional(),
			payloadPath: z.string().optional(),
		})
		.optional(),
	matrix: z.array(z.string()).optional(),
});

export const ReleaseConfigSchema = z.object({
	provider: z.enum(["local", "github"]).default("local"),
	remote: z.string().default("origin"),
	push: z.boolean().default(false),
	repository: z.string().optional(),
	apiUrl: z.string().url().optional(),
});

export const ConfigSchema = z.object({
	engine: z.string().default("local"),
	runtime: z
		.object({
			shell: z.string().optional(),
			maxParallel: z.number().int().positive().optional(),
			keepWorkspaces: z.boolean().default(false),
		})
		.default({ keepWorkspaces: false }),
	env: z.record(z.string()).default({}),
	vars: z.record(z.string()).default({}),
	secrets: z.record(z.string()).default({}),
	presets: z.record(PresetSchema).default({}),
	defaultPreset: z.string().optional(),
	envFile: z.string().optional(),
	varsFile: z.string().optional(),
	secretsFile: z.string().optional(),
	actions: z.record(z.string()).default({}),
	release: ReleaseConfigSchema.default({}),
});

export type RunlaneConfig = z.infer<typeof ConfigSchema>;
export type ReleaseConfig = z.infer<typeof ReleaseConfigSchema>;
