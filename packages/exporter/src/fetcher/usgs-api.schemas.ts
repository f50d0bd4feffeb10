/**
 * Typebox schemas for the USGS latest-continuous items response.
 *
 * Only the fields requested through `properties=value,time` are described;
 * anything else in the GeoJSON feature collection is ignored.
 */

import { Type, type Static } from "@sinclair/typebox";

const RawValue = Type.Union([Type.String(), Type.Number(), Type.Null()]);

export const LatestValueProperties = Type.Object({
  value: Type.Optional(
    Type.Union([RawValue, Type.Object({ value: Type.Optional(RawValue) })]),
  ),
  time: Type.Optional(Type.Union([Type.String(), Type.Null()])),
});

export type LatestValueProperties = Static<typeof LatestValueProperties>;

export const LatestContinuousResponse = Type.Object({
  features: Type.Optional(
    Type.Array(
      Type.Object({
        properties: LatestValueProperties,
      }),
    ),
  ),
});

export type LatestContinuousResponse = Static<typeof LatestContinuousResponse>;
