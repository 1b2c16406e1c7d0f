import { z } from 'zod';

/**
 * Central schema definitions for service inputs and registry payloads.
 */

// --- Names ---

// Credential keys end up in URL paths and in the token's key claim.
export const CredentialNameSchema = z.string()
    .trim()
    .min(1)
    .max(200)
    .regex(/^[^\s/?#]+$/, 'must not contain whitespace, "/", "?" or "#"');

// Lookup of an existing credential by exact key; never used as a path segment.
export const StoredCredentialNameSchema = z.string()
    .min(1)
    .refine(name => name.trim() !== '', 'must not be blank');

export const PrincipalSchema = z.string().trim().min(1).max(255);

// --- API Request Schemas ---

export const IssueTokenRequestSchema = z.object({
    token_name: CredentialNameSchema.optional(),
    ttl_seconds: z.number().int().positive().optional(),
    principal: PrincipalSchema.optional(),
}).strict();

export const ProvisionConsumerRequestSchema = z.object({
    principal: PrincipalSchema.optional(),
}).strict();

export const PrincipalQuerySchema = z.object({
    principal: PrincipalSchema.optional(),
});

export type IssueTokenRequest = z.infer<typeof IssueTokenRequestSchema>;

// --- Registry Payload Schemas ---
// Unknown keys are stripped. The credential schema deliberately has no
// `secret` field so secrets echoed back by the registry never leave the client.

export const RegistryConsumerSchema = z.object({
    id: z.string().min(1),
    username: z.string().nullish(),
    custom_id: z.string().nullish(),
    created_at: z.number().nullish(),
});

export const RegistryCredentialSchema = z.object({
    id: z.string().min(1),
    key: z.string().min(1),
    algorithm: z.string().nullish(),
    created_at: z.number().nullish(),
    consumer: z.object({ id: z.string() }).nullish(),
});

export const registryPageSchema = <T extends z.ZodTypeAny>(item: T) => z.object({
    data: z.array(item),
    next: z.string().nullish(),
});

export type RegistryConsumerPayload = z.infer<typeof RegistryConsumerSchema>;
export type RegistryCredentialPayload = z.infer<typeof RegistryCredentialSchema>;
