import { fields } from "../services/validator.js";
import { defineTool, type Tool, type ToolContext } from "./registry.js";

const listing = {
  node: fields.nonEmpty.optional().describe("Only this node (default: all online nodes)"),
  storage: fields.nonEmpty.optional().describe("Only this storage pool"),
};

export function isoTools({ dispatcher }: ToolContext): Tool[] {
  return [
    defineTool({
      name: "list_isos",
      description: "List ISO images",
      inputSchema: listing,
      handler: ({ node, storage }, { signal }) =>
        dispatcher.run({ op: "iso", action: "list", node, storage }, { signal }),
    }),

    defineTool({
      name: "list_templates",
      description: "List container templates",
      inputSchema: listing,
      handler: ({ node, storage }, { signal }) =>
        dispatcher.run({ op: "iso", action: "list_templates", node, storage }, { signal }),
    }),

    defineTool({
      name: "download_iso",
      description: "Download an ISO image from a URL into a storage pool",
      inputSchema: {
        node: fields.nonEmpty.describe("Node that downloads the image"),
        storage: fields.nonEmpty.describe("Storage pool accepting ISO images"),
        url: fields.downloadUrl.describe("http(s) URL of the image"),
        filename: fields.isoFilename.describe("Target file name, ending in .iso or .img"),
        checksum: fields.checksum.optional().describe("Expected checksum (hex)"),
        checksum_algorithm: fields.checksumAlgorithm.optional().describe("Checksum algorithm (default sha256)"),
      },
      handler: (args, { signal }) => dispatcher.run({ op: "iso", action: "download", ...args }, { signal }),
    }),

    defineTool({
      name: "delete_iso",
      description: "Delete an ISO image or container template",
      inputSchema: {
        node: fields.nonEmpty.describe("Node"),
        storage: fields.nonEmpty.describe("Storage pool"),
        filename: fields.nonEmpty.describe("File name or volume ID"),
      },
      handler: ({ node, storage, filename }, { signal }) =>
        dispatcher.run({ op: "iso", action: "delete", node, storage, filename }, { signal }),
    }),
  ];
}
