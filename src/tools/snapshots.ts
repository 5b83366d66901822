import { z } from "zod";
import { fields } from "../services/validator.js";
import { defineTool, kindOf, vmidArg, vmType, type Tool, type ToolContext } from "./registry.js";

const guest = {
  node: fields.nonEmpty.describe("Node where the guest is located"),
  vmid: vmidArg.describe("VM or container ID, e.g. 100 or '100'"),
  vm_type: vmType,
};

const snapname = fields.snapname.describe("Snapshot name: a letter, then 1-39 letters, digits, '-' or '_'");

export function snapshotTools({ dispatcher }: ToolContext): Tool[] {
  return [
    defineTool({
      name: "list_snapshots",
      description: "List the snapshots of a VM or container",
      inputSchema: guest,
      handler: ({ node, vmid, vm_type }, { signal }) =>
        dispatcher.run(
          { op: "snapshot", action: "list", target: `${node}:${vmid}`, kind: kindOf(vm_type) },
          { signal }
        ),
    }),

    defineTool({
      name: "create_snapshot",
      description: "Create a snapshot of a VM or container. vmstate (RAM) is only available for VMs",
      inputSchema: {
        ...guest,
        snapname,
        description: fields.description.optional().describe("Snapshot description"),
        vmstate: z.boolean().optional().describe("Include the VM's memory state"),
      },
      handler: ({ node, vmid, vm_type, snapname, description, vmstate }, { signal }) =>
        dispatcher.run(
          {
            op: "snapshot",
            action: "create",
            target: `${node}:${vmid}`,
            kind: kindOf(vm_type),
            snapname,
            description,
            vmstate: vmstate ?? false,
          },
          { signal }
        ),
    }),

    defineTool({
      name: "delete_snapshot",
      description: "Delete a snapshot",
      inputSchema: { ...guest, snapname },
      handler: ({ node, vmid, vm_type, snapname }, { signal }) =>
        dispatcher.run(
          { op: "snapshot", action: "delete", target: `${node}:${vmid}`, kind: kindOf(vm_type), snapname },
          { signal }
        ),
    }),

    defineTool({
      name: "rollback_snapshot",
      description: "Roll a VM or container back to a snapshot",
      inputSchema: { ...guest, snapname },
      handler: ({ node, vmid, vm_type, snapname }, { signal }) =>
        dispatcher.run(
          { op: "snapshot", action: "rollback", target: `${node}:${vmid}`, kind: kindOf(vm_type), snapname },
          { signal }
        ),
    }),
  ];
}
