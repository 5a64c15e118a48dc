import React from "react";
import { fireEvent, render, screen, waitFor } from "@testing-library/react";
import { App } from "./app";
import type { ImageExporter } from "../types/renderer-types";

// Exporter the mocked canvas hands back to the App, if any.
let mockExporter: ImageExporter | null = null;

// Mock the MoireCanvas since PixiJS requires a real canvas context
jest.mock("./moire-canvas", () => ({
  MoireCanvas: ({ exportRef }: { exportRef?: { current: ImageExporter | null } }) => {
    if (exportRef) exportRef.current = mockExporter;
    return <div data-testid="moire-canvas" />;
  },
}));

afterEach(() => {
  mockExporter = null;
  jest.restoreAllMocks();
});

describe("App component", () => {
  it("renders controls, title and canvas", () => {
    render(<App />);
    expect(screen.getByText(/Scan area/)).toBeDefined();
    expect(screen.getByText("Resolution: 400 px")).toBeDefined();
    expect(screen.getByText(/Twist angle layer 2/)).toBeDefined();
    expect(screen.getByText("Bilayer Graphene: Twist 1.5°, Strains 2.0% / 3.0%")).toBeDefined();
    expect(screen.getByTestId("moire-canvas")).toBeDefined();
  });

  it("has no twist control for the reference layer", () => {
    render(<App />);
    expect(screen.queryByText(/Twist angle layer 1/)).toBeNull();
  });

  it("switching to trilayer adds layer 3 controls and retitles", () => {
    render(<App />);
    expect(screen.queryByText(/Twist angle layer 3/)).toBeNull();

    fireEvent.change(screen.getByLabelText("Graphene system"), { target: { value: "trilayer" } });

    expect(screen.getByText(/Twist angle layer 3/)).toBeDefined();
    expect(screen.getByText("Trilayer Graphene: Twists 1.5° / -1.5°, Strains 2.0% / 3.0% / 4.0%"))
      .toBeDefined();
  });

  it("switching preset resets the layers", () => {
    render(<App />);
    fireEvent.change(screen.getByLabelText("Layer preset"), { target: { value: "relaxed" } });
    expect(screen.getByText("Bilayer Graphene: Twist 1.1°, Strains 2.0% / 0.0%")).toBeDefined();
  });

  it("offers the download only in High-Res mode", () => {
    render(<App />);
    expect(screen.queryByText("Download Image")).toBeNull();
    expect(screen.getByText(/Quick Mode: fast interactive preview/)).toBeDefined();

    fireEvent.change(screen.getByLabelText("Render mode"), { target: { value: "high-res" } });

    expect(screen.getByText("Download Image")).toBeDefined();
    expect(screen.getByText(/High-Res Mode: may take time to render/)).toBeDefined();
    expect(screen.getByText("Resolution: 1500 px")).toBeDefined();
  });

  it("moving the resolution slider updates its label", () => {
    render(<App />);
    const [, resolution] = screen.getAllByRole("slider");
    fireEvent.change(resolution, { target: { value: "600" } });
    expect(screen.getByText("Resolution: 600 px")).toBeDefined();
  });

  it("downloads the exported image as twisted_graphene.png", async () => {
    mockExporter = () => Promise.resolve("data:image/png;base64,AAAA");
    const clicked: HTMLAnchorElement[] = [];
    jest.spyOn(HTMLAnchorElement.prototype, "click").mockImplementation(function (this: HTMLAnchorElement) {
      clicked.push(this);
    });

    render(<App />);
    fireEvent.change(screen.getByLabelText("Render mode"), { target: { value: "high-res" } });
    fireEvent.click(screen.getByText("Download Image"));

    await waitFor(() => expect(clicked).toHaveLength(1));
    expect(clicked[0].download).toBe("twisted_graphene.png");
    expect(clicked[0].href).toBe("data:image/png;base64,AAAA");
  });

  it("logs a failed export without downloading", async () => {
    mockExporter = () => Promise.reject(new Error("export failed"));
    const click = jest.spyOn(HTMLAnchorElement.prototype, "click").mockImplementation(() => undefined);
    const consoleError = jest.spyOn(console, "error").mockImplementation(() => undefined);

    render(<App />);
    fireEvent.change(screen.getByLabelText("Render mode"), { target: { value: "high-res" } });
    fireEvent.click(screen.getByText("Download Image"));

    await waitFor(() => expect(consoleError).toHaveBeenCalledWith("Failed to export image:", expect.any(Error)));
    expect(click).not.toHaveBeenCalled();
  });
});
