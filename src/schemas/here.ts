/**
 * HERE API response schemas
 *
 * Only the fields the resolver reads are declared; everything else in the
 * payloads is stripped by zod.
 *
 * @module schemas/here
 */

import { z } from 'zod';

const HerePositionSchema = z.object({
  lat: z.number(),
  lng: z.number(),
});

export const HereGeocodeResponseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string().optional(),
        position: HerePositionSchema.optional(),
        address: z
          .object({
            label: z.string().optional(),
            countryCode: z.string().optional(),
          })
          .optional(),
      })
    )
    .default([]),
});

export type HereGeocodeResponse = z.infer<typeof HereGeocodeResponseSchema>;

export const HereDiscoverResponseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string().default(''),
        position: HerePositionSchema.optional(),
        address: z.object({ label: z.string().default('') }).default({}),
        openingHours: z.array(z.object({ isOpen: z.boolean().optional() })).optional(),
      })
    )
    .default([]),
});

export type HereDiscoverResponse = z.infer<typeof HereDiscoverResponseSchema>;

export const HereRouteResponseSchema = z.object({
  routes: z
    .array(
      z.object({
        sections: z.array(
          z.object({
            polyline: z.string().optional(),
            summary: z
              .object({
                length: z.number(),
                duration: z.number(),
              })
              .optional(),
          })
        ),
      })
    )
    .default([]),
});

export type HereRouteResponse = z.infer<typeof HereRouteResponseSchema>;
