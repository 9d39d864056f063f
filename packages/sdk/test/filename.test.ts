import { describe, expect, it } from "vitest";
import { classify, rfc3339FromFilename } from "../src/naming/filename.js";
import { catchNamingError } from "./_util.js";

describe("classify", () => {
  it("recognizes old-style event names and keeps .evt in the base name", () => {
    expect(classify("42.evt")).toEqual({
      style: "old",
      name: "42.evt",
      baseName: "42.evt",
      number: 42n,
      compressed: false,
      kind: "event"
    });
  });

  it("recognizes bare and compressed old-style names", () => {
    const bare = classify("42");
    expect(bare.style === "old" && bare.baseName).toBe("42");
    const gz = classify("7.evt.gz");
    expect(gz.style === "old" && [gz.baseName, gz.compressed]).toEqual(["7.evt", true]);
  });

  it("marks old-style names with the filtered suffix as filtered", () => {
    const p = classify("42.evt.opp.gz");
    expect(p.style).toBe("old");
    expect(p.style === "old" && [p.baseName, p.kind, p.compressed]).toEqual(["42.evt", "filtered", true]);
  });

  it("accepts other kind suffixes on old-style names as unknown", () => {
    expect(classify("42.evt.vct.gz")).toEqual({
      style: "old",
      name: "42.evt.vct.gz",
      baseName: "42.evt",
      number: 42n,
      suffix: "vct",
      compressed: true,
      kind: "unknown"
    });
    const bare = classify("42.vct");
    expect(bare.style === "old" && [bare.baseName, bare.kind]).toEqual(["42", "unknown"]);
  });

  it("keeps old-style numbers exact beyond double precision", () => {
    const p = classify("9007199254740993.evt");
    expect(p.style === "old" && p.number).toBe(9007199254740993n);
  });

  it("recognizes new-style names with a compressed payload", () => {
    const p = classify("2018-03-23T00-00-00+00-00.gz");
    expect(p.style).toBe("new");
    if (p.style !== "new") return;
    expect(p.baseName).toBe("2018-03-23T00-00-00+00-00");
    expect(p.compressed).toBe(true);
    expect(p.kind).toBe("event");
    expect(p.suffix).toBeUndefined();
    expect(rfc3339FromFilename(p)).toBe("2018-03-23T00:00:00+00:00");
  });

  it("derives the kind of new-style names from their suffix", () => {
    const kinds = ["2018-03-23T00-00-00+00-00.evt", "2018-03-23T00-00-00+00-00.opp.gz", "2018-03-23T00-00-00+00-00.vct.gz"].map(
      (n) => {
        const p = classify(n);
        return p.style === "new" ? p.kind : p.style;
      }
    );
    expect(kinds).toEqual(["event", "filtered", "unknown"]);
  });

  it("keeps the filename's own UTC offset", () => {
    const p = classify("2014-05-15T17-07-08-07-00");
    if (p.style !== "new") throw new Error("expected new style");
    expect(p.timestamp.offsetMinutes).toBe(-420);
    expect(p.timestamp.epochMs).toBe(Date.UTC(2014, 4, 16, 0, 7, 8));
    expect(rfc3339FromFilename(p)).toBe("2014-05-15T17:07:08-07:00");
  });

  it("renders a negative zero offset as +00:00", () => {
    expect(rfc3339FromFilename(classify("2014-05-15T17-07-08-00-00"))).toBe("2014-05-15T17:07:08+00:00");
  });

  it("honors a configured filtered suffix", () => {
    const plain = classify("42.evt.flt");
    expect(plain.style === "old" && plain.kind).toBe("unknown");
    const p = classify("42.evt.flt", { filteredSuffix: "flt" });
    expect(p.style === "old" && p.kind).toBe("filtered");
    const q = classify("2018-03-23T00-00-00+00-00.opp", { filteredSuffix: "flt" });
    expect(q.style === "new" && q.kind).toBe("unknown");
  });

  it("returns invalid for names matching neither grammar", () => {
    const names = [
      "",
      "foo.evt",
      ".evt",
      "42.evt.a.b.gz",
      "42.evt.gz.gz",
      "42.gz.evt",
      "-1.evt",
      "2018-03-23T00-00-00Z",
      "2018-03-23T00-00-00+00-00.a.b.gz",
      "2018-03-23 00-00-00+00-00",
      "2018-03-23T00-00-00+00-00..gz",
      "notes.txt"
    ];
    for (const n of names) expect(classify(n)).toEqual({ style: "invalid", name: n });
  });

  it("throws INVALID_TIMESTAMP for impossible dates in new-style names", () => {
    const names = [
      "2018-13-01T00-00-00+00-00",
      "2018-02-29T00-00-00+00-00.gz",
      "2018-03-00T00-00-00+00-00",
      "2018-03-23T24-00-00+00-00",
      "2018-03-23T00-60-00+00-00",
      "2018-03-23T00-00-60+00-00",
      "2018-03-23T00-00-00+24-00",
      "2018-03-23T00-00-00+00-60.opp"
    ];
    for (const n of names) {
      const err = catchNamingError(() => classify(n));
      expect(err.code).toBe("INVALID_TIMESTAMP");
      expect(err.details).toEqual({ name: n });
    }
  });

  it("accepts leap days", () => {
    expect(classify("2016-02-29T12-00-00+00-00").style).toBe("new");
  });
});
