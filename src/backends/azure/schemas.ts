import { z } from "zod";

export const AccountSchema = z.object({
  id: z.string(),
  name: z.string(),
  isDefault: z.boolean().default(false),
  state: z.string().default(""),
  tenantId: z.string(),
  user: z
    .object({
      name: z.string(),
      type: z.string().default(""),
    })
    .optional(),
});

export const AccountListSchema = z.array(AccountSchema);

/** `az account get-access-token --output json` */
export const AccessTokenSchema = z.object({
  accessToken: z.string().min(1),
  expiresOn: z.string().optional(),
  expires_on: z.number().optional(),
});

/** One ARM resource as returned by a provider listing. */
export const ArmResourceSchema = z.object({
  id: z.string(),
  name: z.string(),
  location: z.string().default(""),
});

export function pageOf<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    value: z.array(item).default([]),
    nextLink: z.string().nullish(),
  });
}

/** Key Vault attribute timestamps are Unix seconds. */
export const VaultAttributesSchema = z.object({
  enabled: z.boolean().optional(),
  created: z.number().optional(),
  updated: z.number().optional(),
  exp: z.number().optional(),
  nbf: z.number().optional(),
});

export const VaultSecretItemSchema = z.object({
  id: z.string(),
  contentType: z.string().optional(),
  attributes: VaultAttributesSchema.optional(),
});

export const VaultSecretBundleSchema = VaultSecretItemSchema.extend({
  value: z.string(),
});

export const ContainerAppSecretSchema = z.object({
  name: z.string(),
  value: z.string().optional(),
  keyVaultUrl: z.string().optional(),
});

export const ContainerAppSecretListSchema = z.object({
  value: z.array(ContainerAppSecretSchema).default([]),
});

/** Error envelope shared by ARM and Key Vault. */
export const ErrorEnvelopeSchema = z.object({
  error: z.object({
    code: z.string().optional(),
    message: z.string().optional(),
  }),
});
