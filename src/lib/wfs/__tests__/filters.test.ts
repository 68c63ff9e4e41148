import { describe, it, expect } from "vitest";
import {
  buildCqlEqualsFilter,
  buildCqlFilter,
  buildFesEqualsFilter,
  buildFesFilter,
  escapeXml,
  quoteCql,
} from "../filters";
import { buildGetFeatureUrl } from "../request";

const FES_OPEN = '<Filter xmlns="http://www.opengis.net/fes/2.0">';
const ZONE_LIKE =
  '<PropertyIsLike wildCard="*" singleChar="." escape="!" matchCase="false">' +
  "<ValueReference>nationalCadastralReference</ValueReference>" +
  "<Literal>801062*</Literal></PropertyIsLike>";

function labelEquals(label: string): string {
  return (
    "<PropertyIsEqualTo><ValueReference>label</ValueReference>" +
    `<Literal>${label}</Literal></PropertyIsEqualTo>`
  );
}

describe("FES filter", () => {
  it("builds the zone prefix predicate alone when there are no labels", () => {
    expect(buildFesFilter("801062", [])).toBe(`${FES_OPEN}${ZONE_LIKE}</Filter>`);
  });

  it("pairs every label with the zone prefix inside an OR", () => {
    expect(buildFesFilter("801062", ["12/1", "15"])).toBe(
      `${FES_OPEN}<Or>` +
        `<And>${labelEquals("12/1")}${ZONE_LIKE}</And>` +
        `<And>${labelEquals("15")}${ZONE_LIKE}</And>` +
        `</Or></Filter>`,
    );
  });

  it("omits the zone clause when only labels are given", () => {
    expect(buildFesFilter(undefined, ["7"])).toBe(`${FES_OPEN}<Or><And>${labelEquals("7")}</And></Or></Filter>`);
  });

  it("returns an empty string when there is nothing to filter on", () => {
    expect(buildFesFilter(undefined, [])).toBe("");
    expect(buildFesFilter("   ", [])).toBe("");
  });

  it("escapes XML special characters in labels and zone", () => {
    const filter = buildFesFilter("80<1", ['a&b"']);
    expect(filter).toContain("<Literal>a&amp;b&quot;</Literal>");
    expect(filter).toContain("<Literal>80&lt;1*</Literal>");
  });

  it("builds an equality filter for the zoning layer", () => {
    expect(buildFesEqualsFilter("801062")).toBe(
      `${FES_OPEN}<PropertyIsEqualTo><ValueReference>nationalCadastralReference</ValueReference>` +
        "<Literal>801062</Literal></PropertyIsEqualTo></Filter>",
    );
  });

  it("escapes all five XML entities", () => {
    expect(escapeXml(`<a href='x'>"&"</a>`)).toBe("&lt;a href=&apos;x&apos;&gt;&quot;&amp;&quot;&lt;/a&gt;");
  });
});

describe("CQL filter", () => {
  it("combines labels and zone prefix", () => {
    expect(buildCqlFilter("801062", ["12/1", "15"])).toBe(
      "label IN ('12/1','15') AND nationalCadastralReference LIKE '801062%'",
    );
  });

  it("handles zone-only and label-only queries", () => {
    expect(buildCqlFilter("801062", [])).toBe("nationalCadastralReference LIKE '801062%'");
    expect(buildCqlFilter(undefined, ["3"])).toBe("label IN ('3')");
  });

  it("returns an empty string when there is nothing to filter on", () => {
    expect(buildCqlFilter("", [])).toBe("");
  });

  it("doubles single quotes", () => {
    expect(quoteCql("O'Brien")).toBe("'O''Brien'");
    expect(buildCqlFilter(undefined, ["1' OR '1'='1"])).toBe("label IN ('1'' OR ''1''=''1')");
  });

  it("builds an equality filter for the zoning layer", () => {
    expect(buildCqlEqualsFilter("801062")).toBe("nationalCadastralReference='801062'");
  });
});

describe("buildGetFeatureUrl", () => {
  const base = "https://wfs.example.test/geoserver/cp/ows";

  it("sets WFS 2.0 paging parameters and the FES filter", () => {
    const url = buildGetFeatureUrl(base, {
      typeName: "cp:CP.CadastralParcel",
      count: 500,
      startIndex: 1000,
      filter: { dialect: "fes", expression: "<Filter/>" },
      format: "gml",
    });

    expect(url).toBe(
      `${base}?service=WFS&version=2.0.0&request=GetFeature&typeNames=cp%3ACP.CadastralParcel` +
        "&count=500&startIndex=1000&filter=%3CFilter%2F%3E",
    );
  });

  it("uses CQL_FILTER, srsName and the GeoJSON output format when asked", () => {
    const params = new URL(
      buildGetFeatureUrl(base, {
        typeName: "cp:CP.CadastralZoning",
        count: 1,
        startIndex: 0,
        filter: { dialect: "cql", expression: "nationalCadastralReference='801062'" },
        srsName: "EPSG:4326",
        format: "geojson",
      }),
    ).searchParams;

    expect(params.get("CQL_FILTER")).toBe("nationalCadastralReference='801062'");
    expect(params.has("filter")).toBe(false);
    expect(params.get("srsName")).toBe("EPSG:4326");
    expect(params.get("outputFormat")).toBe("application/json");
  });
});
