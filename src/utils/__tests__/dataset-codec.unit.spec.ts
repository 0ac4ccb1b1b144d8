import { decodeDataset, encodeDataset } from "../dataset-codec";
import { StoreUnavailableError } from "../errors";

describe("dataset codec", () => {
    it("decodes a missing value as an empty dataset", () => {
        expect(decodeDataset(null)).toEqual({ samples: [], last_updated: null });
        expect(decodeDataset(undefined)).toEqual({ samples: [], last_updated: null });
        expect(decodeDataset("")).toEqual({ samples: [], last_updated: null });
    });

    it("round-trips floats and labels without loss", () => {
        const dataset = {
            samples: [
                { value: 0.1 + 0.2, label: "a \"quoted\" label", sequence_index: 0 },
                { value: 1e-300, label: "température ✓", sequence_index: 1 },
                { value: -123456789.987654321, label: "", sequence_index: 2 },
                { value: Number.MAX_VALUE, label: "line\nbreak", sequence_index: 3 }
            ],
            last_updated: "2026-01-02T03:04:05.000Z"
        };
        const decoded = decodeDataset(encodeDataset(dataset));
        expect(decoded).toEqual(dataset);
        expect(decoded.samples[0].value).toBe(0.30000000000000004);
    });

    it("defaults last_updated when the stored document omits it", () => {
        expect(decodeDataset('{"samples":[{"value":2,"label":"x","sequence_index":0}]}')).toEqual({
            samples: [{ value: 2, label: "x", sequence_index: 0 }],
            last_updated: null
        });
    });

    it("refuses to encode a non-finite value", () => {
        expect(() =>
            encodeDataset({
                samples: [{ value: Number.NaN, label: "", sequence_index: 0 }],
                last_updated: null
            })
        ).toThrow(StoreUnavailableError);
    });

    it("reports corrupt stored text as store unavailable", () => {
        expect(() => decodeDataset("{not json")).toThrow(StoreUnavailableError);
        expect(() => decodeDataset('{"samples":"nope"}')).toThrow(
            /Stored dataset has an unexpected shape/
        );
    });
});
