export const IRELAND_COUNTIES: Readonly<Record<string, string>> = Object.freeze({
  galway: "Galway",
  mayo: "Mayo",
  roscommon: "Roscommon",
  sligo: "Sligo",
  leitrim: "Leitrim",
  dublin: "Dublin",
  wicklow: "Wicklow",
  wexford: "Wexford",
  carlow: "Carlow",
  kilkenny: "Kilkenny",
  laois: "Laois",
  longford: "Longford",
  louth: "Louth",
  meath: "Meath",
  offaly: "Offaly",
  westmeath: "Westmeath",
  kildare: "Kildare",
  cork: "Cork",
  kerry: "Kerry",
  limerick: "Limerick",
  tipperary: "Tipperary",
  waterford: "Waterford",
  clare: "Clare",
  cavan: "Cavan",
  donegal: "Donegal",
  monaghan: "Monaghan"
});

export const IRELAND_PROVINCES: Readonly<Record<string, string>> = Object.freeze({
  connacht: "Connacht",
  leinster: "Leinster",
  munster: "Munster",
  ulster: "Ulster"
});

export const PROVINCE_COUNTIES: Readonly<Record<string, readonly string[]>> = Object.freeze({
  connacht: ["galway", "mayo", "roscommon", "sligo", "leitrim"],
  leinster: [
    "dublin",
    "wicklow",
    "wexford",
    "carlow",
    "kilkenny",
    "laois",
    "longford",
    "louth",
    "meath",
    "offaly",
    "westmeath",
    "kildare"
  ],
  munster: ["cork", "kerry", "limerick", "tipperary", "waterford", "clare"],
  // Republic of Ireland part only
  ulster: ["cavan", "donegal", "monaghan"]
});

/** Met Éireann region codes as they appear in the warnings feed. */
export const REGION_CODE_COUNTIES: Readonly<Record<string, string>> = Object.freeze({
  EI01: "carlow",
  EI02: "cavan",
  EI03: "clare",
  EI04: "cork",
  EI06: "donegal",
  EI07: "dublin",
  EI10: "galway",
  EI11: "kerry",
  EI12: "kildare",
  EI13: "kilkenny",
  EI14: "leitrim",
  EI15: "laois",
  EI16: "limerick",
  EI18: "longford",
  EI19: "louth",
  EI20: "mayo",
  EI21: "meath",
  EI22: "monaghan",
  EI23: "offaly",
  EI24: "roscommon",
  EI25: "sligo",
  EI26: "tipperary",
  EI27: "waterford",
  EI29: "westmeath",
  EI30: "wexford",
  EI31: "wicklow"
});

export const NATIONWIDE_REGION_NAME = "Ireland";

/**
 * Display name for a region as it appears in the feed: codes resolve to
 * their county, anything else is returned unchanged.
 */
export function resolveRegionName(region: string): string {
  const countyKey = REGION_CODE_COUNTIES[region.trim().toUpperCase()];
  if (countyKey) {
    return IRELAND_COUNTIES[countyKey] ?? countyKey;
  }
  return region;
}
