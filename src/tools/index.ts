export * from "./AssessTool";
export * from "./ChunkTool";
export * from "./ConvertTool";
export * from "./errors";
export * from "./IndexTool";
export * from "./ListDocumentsTool";
export * from "./RemoveTool";
export * from "./SearchTool";
