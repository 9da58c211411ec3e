import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { HubError } from "../src/errors.js";
import { filterNodes, parseManifest } from "../src/manifest.js";
import { PathFilter } from "../src/node-filters.js";
import type { ProductInfo } from "../src/utils.js";
import { buildManifest, md5 } from "./helpers/fake-hub.js";

const PRODUCT: ProductInfo = {
  id: "p1",
  title: "S2A_T",
  size: 100,
  checksums: {},
  date: null,
  creationDate: null,
  ingestionDate: null,
  footprint: null,
  url: "https://hub.test/odata/v1/Products('p1')/$value",
  quicklookUrl: "https://hub.test/odata/v1/Products('p1')/Products('Quicklook')/$value",
  online: true,
};

const NODES = {
  "measurement/b04.jp2": Buffer.from("band four"),
  "preview/quick-look.png": Buffer.from("png"),
};

describe("parseManifest", () => {
  it("reads every data object", () => {
    assert.deepStrictEqual(parseManifest(buildManifest(NODES)), [
      {
        id: "obj0",
        href: "./measurement/b04.jp2",
        size: 9,
        checksums: { md5: md5("band four") },
      },
      {
        id: "obj1",
        href: "./preview/quick-look.png",
        size: 3,
        checksums: { md5: md5("png") },
      },
    ]);
  });

  it("accepts SHA3-256 checksums", () => {
    const xml = `<XFDU><dataObjectSection><dataObject ID="a"><byteStream size="1">
      <fileLocation href="./x.xml"/><checksum checksumName="SHA3-256">ABC</checksum>
    </byteStream></dataObject></dataObjectSection></XFDU>`;
    assert.deepStrictEqual(parseManifest(Buffer.from(xml))[0].checksums, { "sha3-256": "ABC" });
  });

  it("rejects unsupported checksums", () => {
    const xml = `<XFDU><dataObjectSection><dataObject ID="a"><byteStream size="1">
      <fileLocation href="./x.xml"/><checksum checksumName="CRC32">1</checksum>
    </byteStream></dataObject></dataObjectSection></XFDU>`;
    assert.throws(() => parseManifest(xml), {
      name: "HubError",
      message: "Unsupported checksum CRC32 in manifest data object a",
    });
  });

  it("rejects documents without a data object section", () => {
    assert.throws(() => parseManifest("<XFDU/>"), HubError);
  });
});

describe("filterNodes", () => {
  const nodeUrl = (info: ProductInfo, nodePath: string) => `${info.id}:${nodePath}`;

  it("builds a node per data object", () => {
    const nodes = filterNodes(parseManifest(buildManifest(NODES)), PRODUCT, nodeUrl);
    assert.deepStrictEqual(Object.keys(nodes), ["./measurement/b04.jp2", "./preview/quick-look.png"]);
    assert.deepStrictEqual(nodes["./measurement/b04.jp2"], {
      productId: "p1",
      title: "S2A_T",
      nodePath: "./measurement/b04.jp2",
      url: "p1:measurement/b04.jp2",
      size: 9,
      checksums: { md5: md5("band four") },
    });
  });

  it("keeps what the filter accepts", () => {
    const nodes = filterNodes(
      parseManifest(buildManifest(NODES)),
      PRODUCT,
      nodeUrl,
      new PathFilter("*.jp2")
    );
    assert.deepStrictEqual(Object.keys(nodes), ["./measurement/b04.jp2"]);
  });
});
