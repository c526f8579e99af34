import {
  IRELAND_COUNTIES,
  IRELAND_PROVINCES,
  NATIONWIDE_REGION_NAME,
  PROVINCE_COUNTIES,
  resolveRegionName
} from "../../connectors/shared/ireland-geo.js";
import type { AreaGroup, Warning } from "./types.js";

function slugify(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

function lookupKey(
  table: Readonly<Record<string, string>>,
  value: string,
  kind: string
): string {
  const key = value.trim().toLowerCase();
  if (!Object.hasOwn(table, key)) {
    throw new Error(`Unknown ${kind}: ${value}`);
  }
  return key;
}

function uniqueKeys(values: readonly string[]): string[] {
  return Array.from(new Set(values));
}

export function createNationwideAreaGroup(): AreaGroup {
  return Object.freeze({
    id: slugify(NATIONWIDE_REGION_NAME),
    name: NATIONWIDE_REGION_NAME,
    matcher: Object.freeze({ kind: "all" as const })
  });
}

export function createCountyAreaGroup(counties: readonly string[]): AreaGroup {
  const keys = uniqueKeys(counties.map((county) => lookupKey(IRELAND_COUNTIES, county, "county")));
  if (keys.length === 0) {
    throw new Error("A county area group needs at least one county");
  }

  const names = keys.map((key) => IRELAND_COUNTIES[key] ?? key);
  const name = names.length === 1 && names[0] ? names[0] : `${names.length} Counties`;
  return Object.freeze({
    id: names.length === 1 ? slugify(name) : `counties_${keys.join("_")}`,
    name,
    matcher: Object.freeze({ kind: "regions" as const, names: Object.freeze(names) })
  });
}

/** Provinces are expanded to the counties they contain. */
export function createProvinceAreaGroup(provinces: readonly string[]): AreaGroup {
  const keys = uniqueKeys(
    provinces.map((province) => lookupKey(IRELAND_PROVINCES, province, "province"))
  );
  if (keys.length === 0) {
    throw new Error("A province area group needs at least one province");
  }

  const countyNames = uniqueKeys(keys.flatMap((key) => PROVINCE_COUNTIES[key] ?? [])).map(
    (county) => IRELAND_COUNTIES[county] ?? county
  );
  const single = keys.length === 1 && keys[0] ? IRELAND_PROVINCES[keys[0]] : undefined;
  const name = single ?? `${keys.length} Regions`;
  return Object.freeze({
    id: single ? slugify(single) : `regions_${keys.join("_")}`,
    name,
    matcher: Object.freeze({ kind: "regions" as const, names: Object.freeze(countyNames) })
  });
}

/**
 * Warnings relevant to a group, in feed order. Region codes such as "EI07"
 * are resolved to their county before comparison.
 */
export function filterWarningsForArea(warnings: readonly Warning[], group: AreaGroup): Warning[] {
  const { matcher } = group;
  if (matcher.kind === "all") {
    return [...warnings];
  }

  const wanted = new Set(matcher.names.map((name) => name.trim().toLowerCase()));
  return warnings.filter((warning) =>
    warning.regions.some((region) => {
      const raw = region.trim().toLowerCase();
      return wanted.has(raw) || wanted.has(resolveRegionName(region).toLowerCase());
    })
  );
}
