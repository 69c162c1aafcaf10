// @vitest-environment jsdom
import { cleanup, fireEvent, render, screen } from "@testing-library/react";
import { afterEach, describe, expect, it, vi } from "vitest";
import CoverageView from "@/components/CoverageView";

function stubCoverage(body: unknown) {
  const fetchMock = vi.fn(() => Promise.resolve({ ok: true, status: 200, json: () => Promise.resolve(body) }));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  cleanup();
  vi.unstubAllGlobals();
});

describe("CoverageView", () => {
  it("lists the reachable ranges", async () => {
    stubCoverage({ upTo: 6, ranges: [{ from: 1, to: 1 }, { from: 5, to: 6 }], firstGap: 2, cached: false });
    render(<CoverageView numbers={[2, 3]} />);

    fireEvent.click(screen.getByRole("button", { name: "Scan" }));

    expect(await screen.findByText("1, 5–6")).toBeDefined();
    expect(screen.getByText("Scanned 1–6 · first gap at 2")).toBeDefined();
  });

  it("says the scan stopped when target 1 is the first gap", async () => {
    const fetchMock = stubCoverage({ upTo: 15, ranges: [], firstGap: 1, cached: false });
    render(<CoverageView numbers={[3, 5]} />);

    fireEvent.click(screen.getByRole("checkbox"));
    fireEvent.click(screen.getByRole("button", { name: "Scan" }));

    expect(await screen.findByText("Target 1 is unreachable; larger targets were not scanned")).toBeDefined();
    expect(screen.getByText("Stopped at the first gap, 1")).toBeDefined();
    expect(screen.queryByText("No reachable targets")).toBeNull();
    expect(fetchMock).toHaveBeenCalledWith(
      "/api/coverage",
      expect.objectContaining({ body: JSON.stringify({ numbers: [3, 5], stopAtFirstGap: true }) })
    );
  });

  it("says nothing is reachable only after a full scan", async () => {
    stubCoverage({ upTo: 1, ranges: [], firstGap: 1, cached: false });
    render(<CoverageView numbers={[2, 2]} />);

    fireEvent.click(screen.getByRole("button", { name: "Scan" }));

    expect(await screen.findByText("No reachable targets")).toBeDefined();
  });

  it("clears the result when the hand changes", async () => {
    stubCoverage({ upTo: 6, ranges: [{ from: 1, to: 1 }, { from: 5, to: 6 }], firstGap: 2, cached: false });
    const { rerender } = render(<CoverageView numbers={[2, 3]} />);
    fireEvent.click(screen.getByRole("button", { name: "Scan" }));
    await screen.findByText("1, 5–6");

    rerender(<CoverageView numbers={[2, 4]} />);

    expect(screen.queryByText("1, 5–6")).toBeNull();
  });
});
