import { describe, it, expect } from "vitest";
import { POST } from "./route";

function post(body: unknown): Promise<Response> {
  return POST(
    new Request("http://localhost/api/slabs", {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: typeof body === "string" ? body : JSON.stringify(body),
    })
  );
}

describe("POST /api/slabs", () => {
  it("builds records from two columns", async () => {
    const res = await post({ mode: "columns", lengths: "280\n290", heights: "180\n190", allowance: "-5 x 4" });
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.allowance).toEqual({ lengthDeduction: 4, heightDeduction: 5 });
    expect(body.records).toHaveLength(2);
    expect(body.records[1]).toEqual({
      id: "RG-2",
      grossLength: 290,
      grossHeight: 190,
      netLength: 286,
      netHeight: 185,
      grossArea: 5.51,
      netArea: 5.291,
    });
    expect(body.totals.slabCount).toBe(2);
    expect(body.totals.totalNetArea).toBeCloseTo(10.121, 9);
  });

  it("honors the swap flag for combined paste", async () => {
    const res = await post({ mode: "paste", text: "A-1\t280\t180", allowance: "-5 x 4", swap: true });
    const body = await res.json();
    expect(body.records[0]).toMatchObject({ id: "A-1", netLength: 275, netHeight: 176 });
  });

  it("answers 422 with the mismatch message", async () => {
    const res = await post({ mode: "columns", lengths: "280\n290", heights: "180" });
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      error: "Row count mismatch: 2 length value(s) but 1 height value(s).",
      code: "count_mismatch",
    });
  });

  it("answers 422 when no pasted row parses", async () => {
    const res = await post({ mode: "paste", text: "Slab No\tGross L\tGross H" });
    expect(res.status).toBe(422);
    expect((await res.json()).code).toBe("no_rows");
  });

  it("answers 400 for malformed bodies", async () => {
    expect((await post("not json")).status).toBe(400);
    const res = await post({ mode: "columns", lengths: 280, heights: "180" });
    expect(res.status).toBe(400);
    expect((await res.json()).error).toMatch(/^lengths: /);
    expect((await post({ mode: "rows" })).status).toBe(400);
  });
});
