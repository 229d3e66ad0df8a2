import { match } from "../variant/match";
import { variant, type WithPayload } from "../variant/types";

export type UpcDigits = readonly [numberSystem: number, manufacturer: number, product: number, check: number];

export type Barcode = WithPayload<"Upc", UpcDigits> | WithPayload<"QrCode", string>;

export const Barcode = {
  upc: (numberSystem: number, manufacturer: number, product: number, check: number) =>
    variant<"Upc", UpcDigits>("Upc", [numberSystem, manufacturer, product, check]),
  qrCode: (text: string) => variant("QrCode", text),
} as const;

export function describeBarcode(barcode: Barcode): string {
  return match(barcode, {
    Upc: ({ payload: [numberSystem, manufacturer, product, check] }) =>
      `UPC: ${numberSystem}, ${manufacturer}, ${product}, ${check}.`,
    QrCode: ({ payload }) => `QR code: ${payload}.`,
  });
}
