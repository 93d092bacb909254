import { z } from "zod";
import { BUNDLE_KINDS } from "#/oci";
import { DEFAULT_ENGINE_HOST } from "#/constants";

// Service entry in the app descriptor. Only `image` is read here;
// everything else is carried through untouched.
export const ServiceDescriptorSchema = z
  .object({
    image: z.string(),
  })
  .passthrough();
export type ServiceDescriptor = z.infer<typeof ServiceDescriptorSchema>;

// App descriptor (docker-compose.yml). Services are keyed by name.
export const AppDescriptorSchema = z
  .object({
    services: z.record(z.string(), ServiceDescriptorSchema),
  })
  .passthrough();
export type AppDescriptor = z.infer<typeof AppDescriptorSchema>;

// Credentials and transport settings for one registry domain
export const RegistryEntrySchema = z.object({
  username: z.string().optional(),
  token: z.string().optional(),
  insecure: z.boolean().default(false),
});
export type RegistryEntry = z.infer<typeof RegistryEntrySchema>;

// How digests are resolved: through a local engine, or straight from the registry
export const ResolverStrategySchema = z.enum(["registry", "engine"]);
export type ResolverStrategy = z.infer<typeof ResolverStrategySchema>;

export const BundleKindSchema = z.enum([BUNDLE_KINDS.app, BUNDLE_KINDS.bundle]);

// Engine configuration (.composeapp.yaml)
export const EngineConfigSchema = z.object({
  registries: z.record(z.string(), RegistryEntrySchema).default({}),
  engineHost: z.string().url().default(DEFAULT_ENGINE_HOST),
  strategy: ResolverStrategySchema.default("registry"),
  bundleRoot: z.string().min(1).default("."),
  kind: BundleKindSchema.default(BUNDLE_KINDS.app),
});
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
