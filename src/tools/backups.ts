import { z } from "zod";
import { fields } from "../services/validator.js";
import { defineTool, kindOf, vmidArg, vmType, type Tool, type ToolContext } from "./registry.js";

export function backupTools({ dispatcher }: ToolContext): Tool[] {
  return [
    defineTool({
      name: "list_backups",
      description: "List vzdump backups, newest first",
      inputSchema: {
        node: fields.nonEmpty.optional().describe("Only this node (default: all online nodes)"),
        storage: fields.nonEmpty.optional().describe("Only this storage pool"),
        vmid: vmidArg.optional().describe("Only backups of this guest"),
      },
      handler: ({ node, storage, vmid }, { signal }) =>
        dispatcher.run({ op: "backup", action: "list", node, storage, vmid }, { signal }),
    }),

    defineTool({
      name: "create_backup",
      description: "Back up a VM or container with vzdump",
      inputSchema: {
        node: fields.nonEmpty.describe("Node where the guest is located"),
        vmid: vmidArg.describe("VM or container ID, e.g. 100 or '100'"),
        vm_type: vmType,
        storage: fields.nonEmpty.describe("Backup storage pool"),
        compress: fields.compress.optional().describe("Compression (default zstd)"),
        mode: fields.backupMode.optional().describe("Backup mode (default snapshot)"),
        notes: fields.notes.optional().describe("Notes stored with the backup"),
      },
      handler: ({ node, vmid, vm_type, storage, compress, mode, notes }, { signal }) =>
        dispatcher.run(
          {
            op: "backup",
            action: "create",
            target: `${node}:${vmid}`,
            kind: kindOf(vm_type),
            storage,
            compress: compress ?? "zstd",
            mode: mode ?? "snapshot",
            notes,
          },
          { signal }
        ),
    }),

    defineTool({
      name: "restore_backup",
      description: "Restore a backup archive into a new VM or container; the guest type follows the archive",
      inputSchema: {
        node: fields.nonEmpty.describe("Target node"),
        archive: fields.nonEmpty.describe("Backup volume ID, e.g. local:backup/vzdump-qemu-100-2024_01_01-00_00_00.vma.zst"),
        vmid: vmidArg.describe("ID for the restored guest; must be unused"),
        storage: fields.nonEmpty.optional().describe("Storage for the restored disks"),
        unique: z
          .boolean()
          .optional()
          .describe("Regenerate unique properties such as MAC addresses (default true)"),
      },
      handler: ({ node, archive, vmid, storage, unique }, { signal }) =>
        dispatcher.run(
          { op: "backup", action: "restore", node, archive, vmid, storage, unique: unique ?? true },
          { signal }
        ),
    }),

    defineTool({
      name: "delete_backup",
      description: "Delete a backup archive. Protected backups are refused",
      inputSchema: {
        node: fields.nonEmpty.describe("Node"),
        storage: fields.nonEmpty.describe("Storage pool holding the backup"),
        volid: fields.nonEmpty.describe("Backup volume ID"),
      },
      handler: ({ node, storage, volid }, { signal }) =>
        dispatcher.run({ op: "backup", action: "delete", node, storage, volid }, { signal }),
    }),
  ];
}
