import assert from "node:assert/strict";
import { describe, it } from "node:test";

import {
  createCountyAreaGroup,
  createNationwideAreaGroup,
  createProvinceAreaGroup,
  filterWarningsForArea
} from "../../src/modules/warnings/area-filter.js";
import { makeWarning } from "../support/fixtures.js";

describe("area groups", () => {
  it("builds the nationwide group", () => {
    const group = createNationwideAreaGroup();
    assert.equal(group.id, "ireland");
    assert.equal(group.name, "Ireland");
    assert.deepEqual(group.matcher, { kind: "all" });
  });

  it("names a single county after the county", () => {
    const group = createCountyAreaGroup(["cork"]);
    assert.equal(group.id, "cork");
    assert.equal(group.name, "Cork");
    assert.deepEqual(group.matcher, { kind: "regions", names: ["Cork"] });
  });

  it("names several counties by their number", () => {
    const group = createCountyAreaGroup(["Cork", "kerry", "CORK"]);
    assert.equal(group.id, "counties_cork_kerry");
    assert.equal(group.name, "2 Counties");
  });

  it("expands a province into its counties", () => {
    const group = createProvinceAreaGroup(["Munster"]);
    assert.equal(group.id, "munster");
    assert.equal(group.name, "Munster");
    assert.deepEqual(group.matcher, {
      kind: "regions",
      names: ["Cork", "Kerry", "Limerick", "Tipperary", "Waterford", "Clare"]
    });
  });

  it("names several provinces by their number", () => {
    const group = createProvinceAreaGroup(["ulster", "connacht"]);
    assert.equal(group.id, "regions_ulster_connacht");
    assert.equal(group.name, "2 Regions");
  });

  it("rejects unknown places", () => {
    assert.throws(() => createCountyAreaGroup(["Atlantis"]), /Unknown county: Atlantis/);
    assert.throws(() => createProvinceAreaGroup(["Wessex"]), /Unknown province: Wessex/);
    assert.throws(() => createCountyAreaGroup([]), /at least one county/);
    assert.throws(() => createCountyAreaGroup(["constructor"]), /Unknown county: constructor/);
    assert.throws(() => createProvinceAreaGroup(["toString"]), /Unknown province: toString/);
  });
});

describe("filterWarningsForArea", () => {
  it("matches every warning for the nationwide group, including ones without regions", () => {
    const warnings = [
      makeWarning({ id: "A", regions: [] }),
      makeWarning({ id: "B", regions: ["Dublin"] })
    ];
    const matched = filterWarningsForArea(warnings, createNationwideAreaGroup());
    assert.deepEqual(
      matched.map((warning) => warning.id),
      ["A", "B"]
    );
  });

  it("does not match a county group against another county", () => {
    const warnings = [makeWarning({ id: "A", regions: ["Dublin"] })];
    assert.deepEqual(filterWarningsForArea(warnings, createCountyAreaGroup(["Cork"])), []);
  });

  it("does not match a county group against a warning without regions", () => {
    const warnings = [makeWarning({ id: "A", regions: [] })];
    assert.deepEqual(filterWarningsForArea(warnings, createCountyAreaGroup(["Cork"])), []);
  });

  it("compares region names case-insensitively", () => {
    const warnings = [makeWarning({ id: "A", regions: ["cork"] })];
    const matched = filterWarningsForArea(warnings, createCountyAreaGroup(["Cork"]));
    assert.equal(matched.length, 1);
  });

  it("resolves feed region codes to counties", () => {
    const warnings = [
      makeWarning({ id: "A", regions: ["EI04"] }),
      makeWarning({ id: "B", regions: ["ei11", "EI07"] }),
      makeWarning({ id: "C", regions: ["EI99"] })
    ];

    assert.deepEqual(
      filterWarningsForArea(warnings, createCountyAreaGroup(["Cork"])).map((w) => w.id),
      ["A"]
    );
    assert.deepEqual(
      filterWarningsForArea(warnings, createProvinceAreaGroup(["Munster"])).map((w) => w.id),
      ["A", "B"]
    );
  });

  it("keeps feed order", () => {
    const warnings = [
      makeWarning({ id: "Z", regions: ["Kerry"] }),
      makeWarning({ id: "A", regions: ["Cork"] }),
      makeWarning({ id: "M", regions: ["Clare"] })
    ];
    const matched = filterWarningsForArea(warnings, createProvinceAreaGroup(["munster"]));
    assert.deepEqual(
      matched.map((warning) => warning.id),
      ["Z", "A", "M"]
    );
  });
});
