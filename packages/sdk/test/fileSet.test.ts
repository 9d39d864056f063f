import { describe, expect, it } from "vitest";
import {
  canonicalizePath,
  filterByKind,
  findDuplicateIds,
  identifyAll,
  intersectByIdentity,
  sortChronological
} from "../src/fileset/fileSet.js";
import { createLogger } from "../src/logging/logger.js";

describe("sortChronological", () => {
  it("orders by day-of-year bucket regardless of lexical order", () => {
    expect(sortChronological(["2018_100/2.evt", "2018_050/1.evt"])).toEqual(["2018_050/1.evt", "2018_100/2.evt"]);
  });

  it("orders old-style numbers numerically within a day", () => {
    expect(sortChronological(["2014_185/10.evt", "2014_185/9.evt.gz", "2014_185/100.evt"])).toEqual([
      "2014_185/9.evt.gz",
      "2014_185/10.evt",
      "2014_185/100.evt"
    ]);
  });

  it("orders new-style names by their timestamp bucket, ignoring the directory", () => {
    expect(
      sortChronological(["2018_001/2018-03-24T00-00-00+00-00.gz", "2018_999/2018-03-23T12-00-00+00-00.gz"])
    ).toEqual(["2018_999/2018-03-23T12-00-00+00-00.gz", "2018_001/2018-03-24T00-00-00+00-00.gz"]);
  });

  it("drops stray and corrupt names", () => {
    expect(
      sortChronological(["2014_185/2.evt", "2014_185/notes.txt", "2018-13-01T00-00-00+00-00", "2014_185/1.evt"])
    ).toEqual(["2014_185/1.evt", "2014_185/2.evt"]);
  });

  it("orders long old-style numbers by exact value", () => {
    expect(sortChronological(["2014_185/9007199254740993.evt", "2014_185/9007199254740992.evt"])).toEqual([
      "2014_185/9007199254740992.evt",
      "2014_185/9007199254740993.evt"
    ]);
  });

  it("is stable for equal keys", () => {
    expect(sortChronological(["b/1.evt", "a/1.evt"])).toEqual(["b/1.evt", "a/1.evt"]);
    expect(sortChronological(["a/1.evt", "b/1.evt"])).toEqual(["a/1.evt", "b/1.evt"]);
  });
});

describe("filterByKind", () => {
  const paths = [
    "2014_185/1.evt",
    "2014_185/1.evt.opp.gz",
    "2014_185/1.evt.vct.gz",
    "2018_082/2018-03-23T00-00-00+00-00.vct.gz",
    "2018_082/2018-03-23T00-00-00+00-00.gz",
    "junk.bin"
  ];

  it("keeps only the requested kind", () => {
    expect(filterByKind(paths, "event")).toEqual(["2014_185/1.evt", "2018_082/2018-03-23T00-00-00+00-00.gz"]);
    expect(filterByKind(paths, "filtered")).toEqual(["2014_185/1.evt.opp.gz"]);
    expect(filterByKind(paths, "unknown")).toEqual(["2014_185/1.evt.vct.gz", "2018_082/2018-03-23T00-00-00+00-00.vct.gz"]);
  });

  it("uses the configured filtered suffix", () => {
    expect(filterByKind(["1.evt.flt", "1.evt.opp"], "filtered", { filteredSuffix: "flt" })).toEqual(["1.evt.flt"]);
  });
});

describe("intersectByIdentity", () => {
  it("keeps primary files present in the filter set, chronologically", () => {
    const primary = [
      "evt/2018_082/2018-03-23T06-00-00+00-00.gz",
      "evt/2018_083/2018-03-24T00-00-00+00-00.gz",
      "evt/2018_082/2018-03-23T00-00-00+00-00.gz"
    ];
    const filterSet = ["opp/2018_083/2018-03-24T00-00-00+00-00.opp.gz", "flat/2018-03-23T00-00-00+00-00.opp.gz", "README"];
    expect(intersectByIdentity(primary, filterSet)).toEqual([
      "evt/2018_082/2018-03-23T00-00-00+00-00.gz",
      "evt/2018_083/2018-03-24T00-00-00+00-00.gz"
    ]);
  });

  it("matches old-style event and filtered files through the shared .evt base", () => {
    expect(intersectByIdentity(["a/2014_185/2.evt", "a/2014_185/1.evt"], ["b/2014_185/1.evt.opp.gz"])).toEqual([
      "a/2014_185/1.evt"
    ]);
  });

  it("matches old-style files of other kinds to their event file", () => {
    expect(intersectByIdentity(["2014_185/42.evt.vct.gz"], ["2014_185/42.evt"])).toEqual(["2014_185/42.evt.vct.gz"]);
  });
});

describe("identity helpers", () => {
  it("canonicalizes paths it can identify and leaves the rest alone", () => {
    expect(canonicalizePath("2018_100/2018-03-23T00-00-00+00-00.gz")).toBe("2018_082/2018-03-23T00-00-00+00-00");
    expect(canonicalizePath("notes.txt")).toBe("notes.txt");
  });

  it("reports duplicate canonical ids in first-seen order", () => {
    const dups = findDuplicateIds([
      "2014_185/1.evt",
      "a/2018_082/2018-03-23T00-00-00+00-00.gz",
      "2014_185/1.evt.gz",
      "b/2018_082/2018-03-23T00-00-00+00-00.opp.gz",
      "2014_185/1.evt.opp",
      "2014_185/2.evt"
    ]);
    expect(dups).toEqual([
      ["2014_185/1.evt", 3],
      ["2018_082/2018-03-23T00-00-00+00-00", 2]
    ]);
  });

  it("logs skipped names at debug level", () => {
    const lines: string[] = [];
    const log = createLogger({ level: "debug", json: true, sink: (line) => lines.push(line), now: () => new Date(0) });
    expect(identifyAll(["junk.txt", "2014_185/1.evt"], { log })).toHaveLength(1);
    expect(lines.map((l) => JSON.parse(l))).toEqual([
      { time: "1970-01-01T00:00:00.000Z", level: "debug", msg: "skipping file", path: "junk.txt", code: "UNRECOGNIZED_FILENAME" }
    ]);
  });
});
