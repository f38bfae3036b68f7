/**
 * Geometry values attached to sound events.
 *
 * Geometries are opaque to the exchange engine: they are copied between the
 * domain object and its record untouched. The schema below only pins down the
 * JSON shape of each geometry type so documents can be checked on load.
 */

import { z } from "zod";

/** Time in seconds. */
const Time = z.number();

/** Frequency in hertz. */
const Frequency = z.number();

const Position = z.tuple([Time, Frequency]);

export const GEOMETRY_TYPES = [
  "TimeStamp",
  "TimeInterval",
  "Point",
  "LineString",
  "Polygon",
  "BoundingBox",
  "MultiPoint",
  "MultiLineString",
  "MultiPolygon",
] as const;

export const GeometryType = z.enum(GEOMETRY_TYPES);
export type GeometryType = z.infer<typeof GeometryType>;

export const GeometrySchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("TimeStamp"), coordinates: Time }),
  z.object({ type: z.literal("TimeInterval"), coordinates: z.tuple([Time, Time]) }),
  z.object({ type: z.literal("Point"), coordinates: Position }),
  z.object({ type: z.literal("LineString"), coordinates: z.array(Position) }),
  z.object({ type: z.literal("Polygon"), coordinates: z.array(z.array(Position)) }),
  z.object({
    type: z.literal("BoundingBox"),
    coordinates: z.tuple([Time, Frequency, Time, Frequency]),
  }),
  z.object({ type: z.literal("MultiPoint"), coordinates: z.array(Position) }),
  z.object({
    type: z.literal("MultiLineString"),
    coordinates: z.array(z.array(Position)),
  }),
  z.object({
    type: z.literal("MultiPolygon"),
    coordinates: z.array(z.array(z.array(Position))),
  }),
]);

export type Geometry = z.infer<typeof GeometrySchema>;
