import { readFile } from 'fs/promises';

import { z } from 'zod';

const baseStage = {
  name: z.string().trim().min(1),
  timeoutSeconds: z.number().int().positive().optional(),
};

const commandStageSchema = z.object({
  ...baseStage,
  uses: z.literal('command'),
  with: z.object({
    run: z.string().min(1),
    workingDirectory: z.string().optional(),
    env: z.record(z.string()).optional(),
  }),
});

const buildImageStageSchema = z.object({
  ...baseStage,
  uses: z.literal('build-image'),
  with: z
    .object({
      context: z.string().default('.'),
      dockerfile: z.string().optional(),
      tags: z.array(z.string().min(1)).min(1).default(['{runId}', 'latest']),
      buildArgs: z.record(z.string()).optional(),
    })
    .default({}),
});

const testImageStageSchema = z.object({
  ...baseStage,
  uses: z.literal('test-image'),
  with: z
    .object({
      port: z.number().int().min(1).max(65535).optional(),
      path: z.string().startsWith('/').optional(),
      budgetSeconds: z.number().positive().optional(),
      intervalMs: z.number().int().positive().optional(),
    })
    .default({}),
});

const pushImageStageSchema = z.object({
  ...baseStage,
  uses: z.literal('push-image'),
  with: z
    .object({
      credentialsId: z.string().min(1).optional(),
    })
    .default({}),
});

const deployStageSchema = z.object({
  ...baseStage,
  uses: z.literal('deploy'),
  with: z
    .object({
      name: z.string().min(1).optional(),
      port: z.number().int().min(1).max(65535).optional(),
    })
    .default({}),
});

export const stageDescriptorSchema = z.discriminatedUnion('uses', [
  commandStageSchema,
  buildImageStageSchema,
  testImageStageSchema,
  pushImageStageSchema,
  deployStageSchema,
]);

export const postActionSchema = z.enum(['notify', 'cleanup']);

export const pipelineDocumentSchema = z.object({
  name: z.string().trim().min(1),
  stages: z.array(stageDescriptorSchema).min(1),
  post: z
    .object({
      success: z.array(postActionSchema).default([]),
      failure: z.array(postActionSchema).default([]),
      always: z.array(postActionSchema).default([]),
    })
    .default({}),
});

export type StageDescriptor = z.infer<typeof stageDescriptorSchema>;
export type PostAction = z.infer<typeof postActionSchema>;
export type PipelineDocument = z.infer<typeof pipelineDocumentSchema>;

export const parsePipelineDocument = (raw: unknown): PipelineDocument => pipelineDocumentSchema.parse(raw);

export const loadPipelineDocument = async (filePath: string): Promise<PipelineDocument> => {
  const raw = await readFile(filePath, 'utf8');
  return parsePipelineDocument(JSON.parse(raw));
};
