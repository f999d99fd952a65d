import { existsSync } from "node:fs";
import { z } from "zod";
import type {
  BoardAppearance,
  BoardDefinition,
  ColorScheme,
  FederatedLoginSettings,
  OnboardingSettings,
} from "../adapter/types.ts";
import { describeIssues, readTomlFile } from "./config.ts";
import { ConfigurationError } from "./errors.ts";

const BrandingFileSchema = z.object({
  identity: z.object({
    product_name: z.string().min(1),
    logo_url: z.string().min(1).optional(),
  }),
  theme: z
    .object({
      default_color_scheme: z.enum(["light", "dark"]).default("dark"),
      primary_color: z.string().min(1).optional(),
    })
    .default({}),
  credentials: z.object({
    bootstrap_api_key: z.string().min(1).optional(),
    admin_username: z.string().min(1),
    admin_password: z.string().min(1),
  }),
  settings: z
    .object({
      analytics: z
        .object({
          enable_general: z.boolean().default(false),
          enable_widget_data: z.boolean().default(false),
          enable_integration_data: z.boolean().default(false),
          enable_user_data: z.boolean().default(false),
        })
        .default({}),
      crawling: z
        .object({
          no_index: z.boolean().default(true),
          no_follow: z.boolean().default(true),
          no_translate: z.boolean().default(true),
          no_sitelinks_search_box: z.boolean().default(true),
        })
        .default({}),
    })
    .default({}),
  board: z.object({
    name: z.string().min(1),
    column_count: z.coerce.number().int().positive().default(10),
    is_public: z.boolean().default(true),
    cockpit: z
      .object({
        enabled: z.boolean().default(false),
        id: z.string().min(1).default("cockpit"),
        name: z.string().min(1).default("Cockpit"),
        description: z.string().optional(),
        icon_url: z.string().min(1).optional(),
        href: z.string().url().optional(),
        width: z.coerce.number().int().positive().default(1),
        height: z.coerce.number().int().positive().default(1),
      })
      .refine((c) => !c.enabled || c.href !== undefined, {
        message: "href is required when the cockpit tile is enabled",
        path: ["href"],
      })
      .default({}),
  }),
  federated_login: z
    .object({
      enabled: z.boolean().default(true),
      issuer: z.string().url(),
      client_id: z.string().min(1),
      client_secret: z.string().min(1),
      display_name: z.string().min(1).optional(),
    })
    .optional(),
});

export interface PinnedTile {
  id: string;
  name: string;
  href: string;
  description?: string;
  iconUrl?: string;
  width: number;
  height: number;
}

export interface Branding {
  productName: string;
  bootstrapCredential?: string;
  colorScheme: ColorScheme;
  board: BoardDefinition;
  appearance: BoardAppearance;
  onboarding: OnboardingSettings;
  pinnedTiles: PinnedTile[];
  federatedLogin?: FederatedLoginSettings;
}

export function loadBranding(path: string): Branding {
  if (!existsSync(path)) {
    throw new ConfigurationError(`Branding file not found: ${path}`);
  }

  const result = BrandingFileSchema.safeParse(readTomlFile(path, "branding file"));
  if (!result.success) {
    throw new ConfigurationError(`Invalid branding file ${path}: ${describeIssues(result.error)}`);
  }

  const b = result.data;
  const cockpit = b.board.cockpit;
  const pinnedTiles: PinnedTile[] =
    cockpit.enabled && cockpit.href
      ? [
          {
            id: cockpit.id,
            name: cockpit.name,
            href: cockpit.href,
            description: cockpit.description,
            iconUrl: cockpit.icon_url,
            width: cockpit.width,
            height: cockpit.height,
          },
        ]
      : [];

  return {
    productName: b.identity.product_name,
    bootstrapCredential: b.credentials.bootstrap_api_key,
    colorScheme: b.theme.default_color_scheme,
    board: {
      name: b.board.name,
      columnCount: b.board.column_count,
      isPublic: b.board.is_public,
    },
    appearance: {
      pageTitle: b.identity.product_name,
      logoImageUrl: b.identity.logo_url,
      primaryColor: b.theme.primary_color,
    },
    onboarding: {
      admin: {
        username: b.credentials.admin_username,
        password: b.credentials.admin_password,
      },
      analytics: {
        enableGeneral: b.settings.analytics.enable_general,
        enableWidgetData: b.settings.analytics.enable_widget_data,
        enableIntegrationData: b.settings.analytics.enable_integration_data,
        enableUserData: b.settings.analytics.enable_user_data,
      },
      crawlingAndIndexing: {
        noIndex: b.settings.crawling.no_index,
        noFollow: b.settings.crawling.no_follow,
        noTranslate: b.settings.crawling.no_translate,
        noSiteLinksSearchBox: b.settings.crawling.no_sitelinks_search_box,
      },
    },
    pinnedTiles,
    federatedLogin: b.federated_login && {
      enabled: b.federated_login.enabled,
      issuer: b.federated_login.issuer,
      clientId: b.federated_login.client_id,
      clientSecret: b.federated_login.client_secret,
      displayName: b.federated_login.display_name,
    },
  };
}
