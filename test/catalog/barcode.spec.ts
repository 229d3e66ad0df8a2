import { describe, it, expect } from "vitest";
import { Barcode, describeBarcode } from "../../src/catalog/barcode";
import { payloadOf } from "../../src/variant/match";
import { formatVariant } from "../../src/variant/format";

describe("Barcode", () => {
  it("describes a UPC code", () => {
    expect(describeBarcode(Barcode.upc(8, 85909, 51226, 3))).toBe("UPC: 8, 85909, 51226, 3.");
  });

  it("describes a QR code", () => {
    expect(describeBarcode(Barcode.qrCode("ABCDEFGHIJKLMNOP"))).toBe("QR code: ABCDEFGHIJKLMNOP.");
  });

  it("returns the four UPC numbers unchanged", () => {
    expect(payloadOf(Barcode.upc(8, 85909, 51226, 3))).toEqual([8, 85909, 51226, 3]);
  });

  it("returns the QR text unchanged", () => {
    const text = "https://example.test/ü?q=1";
    expect(payloadOf(Barcode.qrCode(text))).toBe(text);
  });

  it("formats with its payload", () => {
    expect(formatVariant(Barcode.upc(0, 1, 2, 3))).toBe("Upc(0, 1, 2, 3)");
  });
});
