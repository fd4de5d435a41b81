import { beforeEach, describe, expect, it, vi } from "vitest";
import { ConversionError } from "../converter";
import { ConvertTool } from "./ConvertTool";

vi.mock("../utils/logger");

const converter = { convertToFile: vi.fn() };

describe("ConvertTool", () => {
  let tool: ConvertTool;

  beforeEach(() => {
    vi.resetAllMocks();
    tool = new ConvertTool(converter);
  });

  it("should report where the markdown was written", async () => {
    converter.convertToFile.mockResolvedValue({
      markdown: "# Report",
      sourcePath: "/docs/report.pdf",
      method: "content-understanding",
      markdownPath: "/out/report.pdf.md",
    });

    await expect(
      tool.execute({ sourcePath: "/docs/report.pdf", targetDir: "/out" }),
    ).resolves.toEqual({
      markdownPath: "/out/report.pdf.md",
      method: "content-understanding",
      characters: 8,
    });
    expect(converter.convertToFile).toHaveBeenCalledWith("/docs/report.pdf", "/out");
  });

  it("should rethrow conversion failures as ToolError", async () => {
    converter.convertToFile.mockRejectedValue(
      new ConversionError("Failed to read /docs/missing.pdf", "/docs/missing.pdf"),
    );

    await expect(
      tool.execute({ sourcePath: "/docs/missing.pdf", targetDir: "/out" }),
    ).rejects.toThrow(
      "Failed to convert /docs/missing.pdf: Failed to read /docs/missing.pdf",
    );
  });
});
