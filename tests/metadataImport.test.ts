import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { describe, expect, it, vi } from "vitest";
import { ApiError } from "../errors.js";
import { importNetlist, isXmlUpload, parseNetlist } from "../services/metadataImportService.js";
import { TEMPLATE, createFixtureStore, testSettings } from "./fixtures.js";

const here = path.dirname(fileURLToPath(import.meta.url));
const BOARD_XML = fs.readFileSync(path.join(here, "fixtures", "board.xml"), "utf8");

interface Comp {
  ref: string;
  id?: string;
  idField?: string;
  footprint?: string;
  datasheet?: string;
  lib?: string;
  part?: string;
}

function netlist(comps: Comp[]): string {
  const body = comps
    .map(c => {
      const fields = c.id
        ? `<fields><field name="${c.idField ?? "InvenTree"}">${c.id}</field></fields>`
        : "";
      const datasheet = c.datasheet ? `<datasheet>${c.datasheet}</datasheet>` : "";
      return `<comp ref="${c.ref}">
        <footprint>${c.footprint ?? "Resistor_SMD:R_0603_1608Metric"}</footprint>
        ${datasheet}
        ${fields}
        <libsource lib="${c.lib ?? "Device"}" part="${c.part ?? "R"}"/>
      </comp>`;
    })
    .join("\n");
  return `<?xml version="1.0"?><export version="E"><components>${body}</components></export>`;
}

// cut off in the middle of the second component
const TRUNCATED_XML = `<?xml version="1.0"?><export version="E"><components>
  <comp ref="R1">
    <footprint>FP:X</footprint>
    <fields><field name="InvenTree">4</field></fields>
    <libsource lib="Device" part="R"/>
  </comp>
  <comp ref="R2"><footprint>FP:Y`;

const MISMATCHED_XML = `<?xml version="1.0"?><export version="E"><components>
  <comp ref="R1">
    <footprint>FP:X</footprint>
    <fields><field name="InvenTree">4</field></fields>
    <libsource lib="Device" part="R"/>
  </wrong>
</components></export>`;

function upload(content: string, overrides: { username?: string; fileName?: string; contentType?: string } = {}) {
  return {
    content,
    contentType: overrides.contentType ?? "text/xml",
    fileName: overrides.fileName ?? "board.xml",
    username: overrides.username ?? "alice"
  };
}

function paramsOf(data: ReturnType<ReturnType<typeof createFixtureStore>["snapshot"]>, partId: number) {
  const part = data.parts.find(p => p.id === partId);
  return Object.fromEntries((part?.parameters ?? []).map(p => [p.templateId, p.data]));
}

describe("parseNetlist", () => {
  it("reads every component with its fields", () => {
    const comps = parseNetlist(BOARD_XML);

    expect(comps.map(c => c.ref)).toEqual(["R1", "R2", "U12", "H1", "C3"]);
    expect(comps[0]).toEqual({
      ref: "R1",
      footprint: "Resistor_SMD:R_0603_1608Metric",
      datasheet: "https://example.com/r.pdf",
      lib: "Device",
      part: "R",
      fields: [{ name: "InvenTree", value: "1" }]
    });
    expect(comps[3].fields).toEqual([]);
    expect(comps[4].footprint).toBeNull();
  });

  it("rejects a document without a components list", () => {
    expect(() => parseNetlist('<export version="E"><design/></export>')).toThrow(
      "Malformed netlist: no components list found"
    );
  });

  it("only reads a components list directly below the root element", () => {
    const nested = `<export version="E"><design><components><comp ref="R1"/></components></design></export>`;
    expect(() => parseNetlist(nested)).toThrow("Malformed netlist: no components list found");
  });

  it("rejects documents that are not well-formed", () => {
    expect(() => parseNetlist("this is not xml at all")).toThrow(/^Malformed XML file: /);
    expect(() => parseNetlist(TRUNCATED_XML)).toThrow(/^Malformed XML file: /);
    expect(() => parseNetlist(MISMATCHED_XML)).toThrow(/^Malformed XML file: /);
  });
});

describe("isXmlUpload", () => {
  it("accepts an XML content type or file name", () => {
    expect(isXmlUpload("application/xml", "netlist")).toBe(true);
    expect(isXmlUpload("application/octet-stream", "board.XML")).toBe(true);
    expect(isXmlUpload("text/plain", "notes.txt")).toBe(false);
  });
});

describe("importNetlist", () => {
  it("updates valid components and reports the rest", async () => {
    const store = createFixtureStore();
    const summary = await importNetlist(store, testSettings(), upload(BOARD_XML));

    expect(summary).toEqual({
      fileName: "board.xml",
      total: 5,
      updated: [1],
      parametersWritten: 3,
      duplicates: ["1"],
      errors: [
        {
          ref: "U12",
          identifier: "99",
          reason: "Part ID 99 does not belong to an existing part"
        },
        { ref: "H1", identifier: null, reason: "Missing fields" },
        { ref: "C3", identifier: null, reason: "Missing footprint" }
      ]
    });

    expect(paramsOf(store.snapshot(), 1)).toEqual({
      [TEMPLATE.symbol]: "Device:R",
      [TEMPLATE.footprint]: "Resistor_SMD:R_0603_1608Metric",
      [TEMPLATE.reference]: "R",
      [TEMPLATE.resistance]: "10k",
      [TEMPLATE.package]: "0603",
      [TEMPLATE.tolerance]: "1"
    });
  });

  it("writes each part once however often it is listed", async () => {
    const store = createFixtureStore();
    const setParameter = vi.spyOn(store, "setParameter");

    const summary = await importNetlist(
      store,
      testSettings(),
      upload(
        netlist([
          { ref: "R1", id: "1" },
          { ref: "R2", id: "1" },
          { ref: "R3", id: "1" }
        ])
      )
    );

    expect(summary.updated).toEqual([1]);
    expect(summary.duplicates).toEqual(["1", "1"]);
    expect(setParameter).toHaveBeenCalledTimes(3);
  });

  it("treats a name that resolves to an already imported part as a duplicate", async () => {
    const store = createFixtureStore();
    const settings = testSettings({ IMPORT_INVENTREE_ID_FALLBACK: true });

    const summary = await importNetlist(
      store,
      settings,
      upload(
        netlist([
          { ref: "R1", id: "1" },
          { ref: "R2", id: "R_10k_0603" }
        ])
      )
    );

    expect(summary.updated).toEqual([1]);
    expect(summary.duplicates).toEqual(["R_10k_0603"]);
  });

  it("keeps existing values unless overriding", async () => {
    const store = createFixtureStore();
    const file = netlist([{ ref: "R7", id: "2", lib: "Device", part: "R_Small" }]);

    const kept = await importNetlist(store, testSettings(), upload(file));
    expect(kept.parametersWritten).toBe(1);
    expect(paramsOf(store.snapshot(), 2)[TEMPLATE.symbol]).toBe("Custom:Lib:R:Alt");
    expect(paramsOf(store.snapshot(), 2)[TEMPLATE.reference]).toBe("RN");
    expect(paramsOf(store.snapshot(), 2)[TEMPLATE.footprint]).toBe("Resistor_SMD:R_0603_1608Metric");

    const overridden = await importNetlist(
      store,
      testSettings({ IMPORT_INVENTREE_OVERRIDE_PARAS: true }),
      upload(file)
    );
    expect(overridden.parametersWritten).toBe(3);
    expect(paramsOf(store.snapshot(), 2)[TEMPLATE.symbol]).toBe("Device:R_Small");
    expect(paramsOf(store.snapshot(), 2)[TEMPLATE.reference]).toBe("R");
  });

  it("strips the designator number", async () => {
    const store = createFixtureStore();
    await importNetlist(store, testSettings(), upload(netlist([{ ref: "CAV123", id: "4" }])));
    expect(paramsOf(store.snapshot(), 4)[TEMPLATE.reference]).toBe("CAV");
  });

  it("matches the identifier field by prefix", async () => {
    const store = createFixtureStore();
    const summary = await importNetlist(
      store,
      testSettings(),
      upload(netlist([{ ref: "R1", id: "4", idField: "InvenTree ID" }]))
    );
    expect(summary.updated).toEqual([4]);
  });

  it("falls back to the part name only when enabled", async () => {
    const file = netlist([{ ref: "C1", id: "C_100n" }]);

    const strict = await importNetlist(createFixtureStore(), testSettings(), upload(file));
    expect(strict.errors).toEqual([
      { ref: "C1", identifier: "C_100n", reason: "Part ID C_100n does not belong to an existing part" }
    ]);

    const lenient = await importNetlist(
      createFixtureStore(),
      testSettings({ IMPORT_INVENTREE_ID_FALLBACK: true }),
      upload(file)
    );
    expect(lenient.updated).toEqual([3]);
  });

  it("reports components without an identifier", async () => {
    const summary = await importNetlist(
      createFixtureStore(),
      testSettings(),
      upload(netlist([{ ref: "R1", id: "5", idField: "Supplier" }]))
    );
    expect(summary.errors).toEqual([{ ref: "R1", identifier: null, reason: "Missing part id" }]);
  });

  it("attaches valid datasheet links when enabled", async () => {
    const store = createFixtureStore();
    const settings = testSettings({ KICAD_META_DATA_IMPORT_ADD_DATASHEET: true });

    const summary = await importNetlist(
      store,
      settings,
      upload(
        netlist([
          { ref: "R1", id: "1", datasheet: "https://example.com/other.pdf" },
          { ref: "R2", id: "2", datasheet: "https://example.com/r1k.pdf" },
          { ref: "H1", id: "4", datasheet: "not a url" },
          { ref: "J1", id: "5", datasheet: "~" }
        ])
      )
    );

    expect(summary.updated).toEqual([1, 2, 4, 5]);
    expect(summary.errors).toEqual([
      { ref: "H1", identifier: "4", reason: "URL is invalid: not a url" }
    ]);

    const data = store.snapshot();
    const attachments = (id: number) => data.parts.find(p => p.id === id)?.attachments;
    expect(attachments(1)).toEqual([{ comment: "Datasheet", link: "https://example.com/r.pdf" }]);
    expect(attachments(2)).toEqual([{ comment: "Datasheet", link: "https://example.com/r1k.pdf" }]);
    expect(attachments(4)).toEqual([]);
    expect(attachments(5)).toEqual([]);
  });

  it("records a failing component and carries on", async () => {
    const store = createFixtureStore();
    const settings = testSettings({ KICAD_SYMBOL_PARAMETER: 42 });

    const summary = await importNetlist(store, settings, upload(netlist([{ ref: "R1", id: "1" }])));

    expect(summary.updated).toEqual([]);
    expect(summary.errors).toEqual([
      { ref: "R1", identifier: "1", reason: "Unexpected error: Parameter template 42 not found" }
    ]);
  });

  it("reports progress per component and finishes at 100", async () => {
    const store = createFixtureStore();
    const saveProgress = vi.spyOn(store, "saveProgress");

    await importNetlist(
      store,
      testSettings(),
      upload(
        netlist([
          { ref: "R1", id: "1" },
          { ref: "R2", id: "2" },
          { ref: "R3", id: "4" },
          { ref: "R4", id: "5" }
        ])
      )
    );

    expect(saveProgress.mock.calls.map(([p]) => p.currentProgress)).toEqual([0, 0, 25, 50, 75, 100]);
    expect(await store.getProgress("alice")).toEqual({
      username: "alice",
      currentProgress: 100,
      fileName: "board.xml"
    });
  });

  it("finishes the progress row when a progress write fails", async () => {
    const store = createFixtureStore();
    const save = store.saveProgress.bind(store);
    vi.spyOn(store, "saveProgress").mockImplementation(async progress => {
      if (progress.currentProgress === 50) throw new Error("disk full");
      return save(progress);
    });

    const result = importNetlist(
      store,
      testSettings(),
      upload(
        netlist([
          { ref: "R1", id: "1" },
          { ref: "R2", id: "2" },
          { ref: "R3", id: "4" },
          { ref: "R4", id: "5" }
        ])
      )
    );

    await expect(result).rejects.toThrow("disk full");
    expect(await store.getProgress("alice")).toEqual({
      username: "alice",
      currentProgress: 100,
      fileName: "board.xml"
    });
  });

  it("keeps progress per user", async () => {
    const store = createFixtureStore();
    await importNetlist(store, testSettings(), upload(BOARD_XML, { username: "bob", fileName: "bob.xml" }));
    await importNetlist(store, testSettings(), upload(BOARD_XML, { username: "alice", fileName: "alice.xml" }));

    expect(await store.getProgress("bob")).toEqual({
      username: "bob",
      currentProgress: 100,
      fileName: "bob.xml"
    });
    expect((await store.getProgress("alice")).fileName).toBe("alice.xml");
  });

  describe("rejected uploads", () => {
    async function expectRejectedUntouched(
      settings: ReturnType<typeof testSettings>,
      file: ReturnType<typeof upload>,
      message: string | RegExp
    ) {
      const store = createFixtureStore();
      const before = store.snapshot();

      const result = importNetlist(store, settings, file);
      await expect(result).rejects.toBeInstanceOf(ApiError);
      await expect(result).rejects.toMatchObject({
        status: 422,
        message: typeof message === "string" ? message : expect.stringMatching(message)
      });
      expect(store.snapshot()).toEqual(before);
    }

    it("rejects a malformed file without writing anything", async () => {
      await expectRejectedUntouched(
        testSettings(),
        upload("this is not xml at all"),
        /^Malformed XML file: /
      );
    });

    it("rejects a truncated netlist without writing anything", async () => {
      await expectRejectedUntouched(testSettings(), upload(TRUNCATED_XML), /^Malformed XML file: /);
    });

    it("rejects a netlist with a mismatched closing tag without writing anything", async () => {
      await expectRejectedUntouched(testSettings(), upload(MISMATCHED_XML), /^Malformed XML file: /);
    });

    it("rejects a netlist without a components list without writing anything", async () => {
      await expectRejectedUntouched(
        testSettings(),
        upload('<?xml version="1.0"?><export version="E"><design/></export>'),
        "Malformed netlist: no components list found"
      );
    });

    it("rejects files that are not XML", async () => {
      await expectRejectedUntouched(
        testSettings(),
        upload(BOARD_XML, { contentType: "text/plain", fileName: "notes.txt" }),
        "XML file expected!"
      );
    });

    it("rejects imports before the KiCad templates are configured", async () => {
      await expectRejectedUntouched(
        testSettings({ KICAD_REFERENCE_PARAMETER: null }),
        upload(BOARD_XML),
        "Missing parameters. Please make sure you have selected appropriate parameters in the settings before attempting to import anything."
      );
    });
  });
});
