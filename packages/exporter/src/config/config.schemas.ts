/**
 * Typebox schemas for the gauges file.
 */

import { Type, type Static } from "@sinclair/typebox";

const Code = Type.String({ pattern: "^[0-9]+$" });

export const GaugeEntry = Type.Object({
  /** USGS site code */
  id: Code,
  name: Type.Optional(Type.String({ minLength: 1 })),
  friendly_name: Type.Optional(Type.String({ minLength: 1 })),
  parameter_code: Type.Optional(Code),
  statistic_id: Type.Optional(Code),
});

export type GaugeEntry = Static<typeof GaugeEntry>;

export const GaugesFile = Type.Array(GaugeEntry);

export type GaugesFile = Static<typeof GaugesFile>;
