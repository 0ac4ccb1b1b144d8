import { summarizeArgs, withToolLogging } from "../tool-logging";

describe("tool logging", () => {
    let lines: string[];

    beforeEach(() => {
        lines = [];
        jest.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
            lines.push(args.map(String).join(" "));
        });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it("summarizes arguments and hides secrets", () => {
        expect(summarizeArgs({ value: 1.5, label: "cpu", token: "test-secret" })).toBe(
            'value=1.5 label="cpu" token=***'
        );
    });

    it("truncates long values", () => {
        expect(summarizeArgs({ title: "x".repeat(100) })).toBe(`title="${"x".repeat(79)}…`);
    });

    it("logs one line per call with the outcome", async () => {
        await withToolLogging("push", { value: 1 }, async () => ({ kind: "json", data: {} }));
        await withToolLogging("get_chart", {}, async () => ({
            kind: "error",
            code: "RENDER_FAILURE",
            message: "no rasterizer"
        }));
        expect(lines).toHaveLength(2);
        expect(lines[0]).toMatch(/^\[tool\] push ok \d+ms$/);
        expect(lines[1]).toMatch(/^\[tool\] get_chart error \d+ms RENDER_FAILURE: no rasterizer$/);
    });
});
