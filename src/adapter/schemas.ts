import { z } from "zod";

// --- state file ---

const DiscoveredAppObjectSchema = z.object({
  tile_id: z.string().min(1),
  name: z.string().optional(),
  url: z.string().optional(),
  added_at: z.string().optional(),
});

// Older state files map the app id straight to the tile id.
export const DiscoveredAppRecordSchema = z.union([
  z
    .string()
    .min(1)
    .transform((tileId): z.infer<typeof DiscoveredAppObjectSchema> => ({ tile_id: tileId })),
  DiscoveredAppObjectSchema,
]);

export const StateFileSchema = z.object({
  version: z.string().default("1.0"),
  permanent_credential: z.string().min(1).optional(),
  first_boot_completed: z.boolean().default(false),
  discovered_apps: z.record(z.string(), DiscoveredAppRecordSchema).default({}),
  removed_apps: z.array(z.string()).default([]),
  last_sync_at: z.string().optional(),
});

export type StateFile = z.input<typeof StateFileSchema>;

// --- container labels ---

export const AppLabelsSchema = z.object({
  "homarr.name": z.string().trim().min(1),
  "homarr.url": z.string().trim().url(),
  "homarr.icon": z.string().trim().min(1).optional(),
  "homarr.description": z.string().trim().min(1).optional(),
  "homarr.category": z.string().trim().min(1).optional(),
  "homarr.id": z.string().trim().min(1).optional(),
});

// --- Homarr tRPC ---

export const TrpcErrorSchema = z.object({
  error: z.object({
    json: z.object({
      message: z.string(),
    }),
  }),
});

export const OnboardingStepSchema = z.object({
  current: z.string(),
  previous: z.string().nullish(),
});

export const CreateApiKeySchema = z.object({
  apiKey: z.string().min(1),
});

export const ApiKeyListSchema = z.array(z.object({ id: z.string() }).passthrough());

export const BoardSectionSchema = z
  .object({
    id: z.string(),
    kind: z.string(),
    name: z.string().nullish(),
    xOffset: z.number(),
    yOffset: z.number(),
  })
  .passthrough();

export const BoardLayoutSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    columnCount: z.number(),
    breakpoint: z.number(),
  })
  .passthrough();

export const ItemLayoutSchema = z.object({
  layoutId: z.string(),
  sectionId: z.string(),
  width: z.number(),
  height: z.number(),
  xOffset: z.number(),
  yOffset: z.number(),
});

export const BoardItemSchema = z
  .object({
    id: z.string(),
    kind: z.string(),
    options: z.record(z.string(), z.unknown()).default({}),
    layouts: z.array(ItemLayoutSchema).default([]),
  })
  .passthrough();

export const BoardSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    isPublic: z.boolean().optional(),
    sections: z.array(BoardSectionSchema).default([]),
    layouts: z.array(BoardLayoutSchema).default([]),
    items: z.array(BoardItemSchema).default([]),
    integrations: z.array(z.unknown()).default([]),
  })
  .passthrough();

export type Board = z.infer<typeof BoardSchema>;
export type BoardItem = z.infer<typeof BoardItemSchema>;

export const BoardRefSchema = z.object({ id: z.string(), name: z.string() }).passthrough();

export const CreateBoardSchema = z.object({ boardId: z.string() });

export const CreateAppSchema = z.object({ appId: z.string() });

export const AppListSchema = z.array(
  z
    .object({
      id: z.string(),
      name: z.string(),
      href: z.string().nullish(),
    })
    .passthrough(),
);

export const FederatedLoginSchema = z.object({
  enabled: z.boolean(),
  issuer: z.string(),
  clientId: z.string(),
  displayName: z.string().optional(),
});

export const ServerSettingsSchema = z
  .object({
    federatedLogin: FederatedLoginSchema.nullish(),
  })
  .passthrough();
