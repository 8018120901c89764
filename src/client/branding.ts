// src/client/branding.ts
// web/branding.json: the project-specific look of the dashboard. Written by
// the quickstart, read by the UI shell at startup.

import { z } from "zod";

export const COLOR_PALETTE = [
  "blue",
  "indigo",
  "purple",
  "pink",
  "red",
  "orange",
  "green",
  "teal",
  "cyan",
  "gray",
] as const;

export type PaletteColor = (typeof COLOR_PALETTE)[number];

export const ColorSchema = z.enum(COLOR_PALETTE);

const ColorClassesSchema = z.object({
  background: z.string(),
  hoverBackground: z.string(),
  text: z.string(),
  border: z.string(),
  focusRing: z.string(),
});

export type ColorClasses = z.infer<typeof ColorClassesSchema>;

export const NavItemSchema = z.object({
  name: z.string().min(1),
  href: z.string().startsWith("/"),
  icon: z.string().min(1),
});

export type NavItem = z.infer<typeof NavItemSchema>;

export const BrandingSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  primaryColor: ColorSchema,
  colorClasses: ColorClassesSchema,
  tokenStorage: z.object({
    accessToken: z.string().min(1),
    refreshToken: z.string().min(1),
  }),
  navigation: z.array(NavItemSchema),
});

export type Branding = z.infer<typeof BrandingSchema>;

export function colorClasses(color: PaletteColor): ColorClasses {
  return {
    background: `bg-${color}-600`,
    hoverBackground: `hover:bg-${color}-700`,
    text: `text-${color}-600`,
    border: `border-${color}-600`,
    focusRing: `focus:ring-${color}-500`,
  };
}

export function parseBranding(raw: unknown): Branding {
  return BrandingSchema.parse(raw);
}
