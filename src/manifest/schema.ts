/**
 * Schemas for the remote documents the pipeline reads
 * Only the fields the pipeline needs are declared; anything else is ignored.
 */

import { z } from 'zod';
import { ParseError } from '../utils/errors';

const PATH_SAFE_ID = /^[\w.-]+$/;
/** Hex digest naming a stored object; the first two characters pick its shard */
export const CONTENT_HASH = /^[0-9a-f]{2,}$/i;

export const PlatformRuleSchema = z.object({
    action: z.string(),
    os: z
        .object({
            name: z.string().optional(),
        })
        .optional(),
});

export const LibraryArtifactSchema = z.object({
    path: z.string().min(1),
    url: z.string().url(),
    sha1: z.string().optional(),
    size: z.number().optional(),
});

export const LibraryEntrySchema = z.object({
    name: z.string(),
    downloads: z
        .object({
            artifact: LibraryArtifactSchema.optional(),
        })
        .optional(),
    rules: z.array(PlatformRuleSchema).optional(),
});

export const VersionManifestSchema = z.object({
    id: z.string().regex(PATH_SAFE_ID),
    type: z.string().optional(),
    downloads: z.object({
        client: z.object({
            url: z.string().url(),
            sha1: z.string().optional(),
            size: z.number().optional(),
        }),
    }),
    assetIndex: z.object({
        id: z.string().regex(PATH_SAFE_ID),
        url: z.string().url(),
    }),
    libraries: z.array(LibraryEntrySchema),
});

export const AssetEntrySchema = z.object({
    hash: z.string().regex(CONTENT_HASH),
    size: z.number().int().nonnegative(),
});

export const AssetIndexSchema = z.object({
    objects: z.record(AssetEntrySchema),
});

export const VersionListSchema = z.object({
    versions: z.array(
        z.object({
            id: z.string(),
            url: z.string().url(),
        }),
    ),
});

export type PlatformRule = z.infer<typeof PlatformRuleSchema>;
export type LibraryArtifact = z.infer<typeof LibraryArtifactSchema>;
export type LibraryEntry = z.infer<typeof LibraryEntrySchema>;
export type VersionManifest = z.infer<typeof VersionManifestSchema>;
export type AssetEntry = z.infer<typeof AssetEntrySchema>;
export type AssetIndex = z.infer<typeof AssetIndexSchema>;
export type VersionList = z.infer<typeof VersionListSchema>;

/**
 * Parse a JSON document and validate it against a schema
 * Both malformed JSON and a shape mismatch surface as ParseError.
 */
export function parseDocument<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string, source: string): T {
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new ParseError(`Malformed JSON from ${source}`, source, error);
    }

    const result = schema.safeParse(json);
    if (!result.success) {
        const issues = result.error.issues
            .slice(0, 5)
            .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
            .join('; ');
        throw new ParseError(`Unexpected document shape from ${source}: ${issues}`, source, result.error);
    }
    return result.data;
}
