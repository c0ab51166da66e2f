import { z } from "zod";
import { CURRENT } from "./components.ts";

export const treeOptionsSchema = z.object({
  /** Character joining components in the encoded and rendered forms. */
  separator: z
    .string()
    .length(1, "separator must be a single character")
    .refine((s) => s !== CURRENT, `separator cannot be "${CURRENT}"`)
    .default("/"),
  /** Label of the directory the items are relative to, if any. */
  root: z.string().optional(),
});

export type TreeOptions = z.input<typeof treeOptionsSchema>;
export type ResolvedTreeOptions = z.output<typeof treeOptionsSchema>;

export function parseTreeOptions(
  options: TreeOptions = {},
): ResolvedTreeOptions {
  return treeOptionsSchema.parse(options);
}
