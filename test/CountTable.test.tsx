// @vitest-environment jsdom
import { act, cleanup, fireEvent, render, screen } from "@testing-library/react";
import { afterEach, describe, expect, it, vi } from "vitest";
import CountTable from "@/components/CountTable";

const ROWS = {
  rows: [
    { target: 1, count: 1 },
    { target: 5, count: 1 },
    { target: 6, count: 1 },
  ],
  cached: false,
};

function jsonResponse(body: unknown) {
  return { ok: true, status: 200, json: () => Promise.resolve(body) };
}

afterEach(() => {
  cleanup();
  vi.unstubAllGlobals();
});

describe("CountTable", () => {
  it("groups the counted targets into tiers", async () => {
    vi.stubGlobal("fetch", vi.fn(() => Promise.resolve(jsonResponse(ROWS))));
    render(<CountTable numbers={[2, 3]} />);

    fireEvent.click(screen.getByRole("button", { name: "Count" }));

    expect(await screen.findByText("1 answer (3 targets)")).toBeDefined();
  });

  it("clears the rows when the hand changes", async () => {
    vi.stubGlobal("fetch", vi.fn(() => Promise.resolve(jsonResponse(ROWS))));
    const { rerender } = render(<CountTable numbers={[2, 3]} />);
    fireEvent.click(screen.getByRole("button", { name: "Count" }));
    await screen.findByText("1 answer (3 targets)");

    rerender(<CountTable numbers={[4, 4]} />);

    expect(screen.queryByText("1 answer (3 targets)")).toBeNull();
  });

  it("ignores a response for the previous hand", async () => {
    let respond: (body: unknown) => void = () => undefined;
    const pending = new Promise<unknown>((resolve) => {
      respond = resolve;
    });
    vi.stubGlobal("fetch", vi.fn(() => pending.then(jsonResponse)));
    const { rerender } = render(<CountTable numbers={[2, 3]} />);
    fireEvent.click(screen.getByRole("button", { name: "Count" }));

    rerender(<CountTable numbers={[4, 4]} />);
    await act(async () => {
      respond(ROWS);
      await pending;
    });

    expect(screen.queryByText("1 answer (3 targets)")).toBeNull();
    expect(screen.getByRole("button", { name: "Count" })).toBeDefined();
  });
});
