import { z } from 'zod';

export const GroupSchema = z.object({
    name: z.string().min(1),
    tokens: z.array(z.string()),
});

export const LevelSchema = z.object({
    tokens: z.array(z.string()).default([]),
    groups: z.array(z.string()).default([]),
});

export const ObjectSchema = z.object({
    uuid: z.string().min(1).optional(),
    level: LevelSchema,
});

export const PageSchema = z.object({
    limit: z.coerce.number().int().min(0).optional(),
    offset: z.coerce.number().int().min(0).optional(),
});

export type GroupBody = z.infer<typeof GroupSchema>;
export type ObjectBody = z.infer<typeof ObjectSchema>;
