import { z } from 'zod';
import { nullable } from '../validation.js';

/** File or directory node as sent by the files/info endpoint. */
export interface PathInfoWire {
  path: string;
  name: string;
  isTextFile: boolean;
  isConfigFile: boolean;
  isDirectory: boolean;
  isLog: boolean;
  isReadable: boolean;
  isWritable: boolean;
  size: number;
  children?: PathInfoWire[] | null;
}

export interface PathInfo {
  readonly path: string;
  readonly name: string;
  readonly isText: boolean;
  readonly isConfig: boolean;
  readonly isDirectory: boolean;
  readonly isLog: boolean;
  readonly isReadable: boolean;
  readonly isWritable: boolean;
  /** Size in bytes. */
  readonly size: number;
  /** Directory entries; `null` for files and for directories listed without content. */
  readonly children: readonly PathInfo[] | null;
}

/**
 * Recursive node schema. Wire keys are listed on the left of the transform;
 * violations are reported under the wire key.
 */
export const pathInfoSchema: z.ZodType<PathInfo, z.ZodTypeDef, PathInfoWire> = z.lazy(() =>
  z
    .object({
      path: z.string(),
      name: z.string(),
      isTextFile: z.boolean(),
      isConfigFile: z.boolean(),
      isDirectory: z.boolean(),
      isLog: z.boolean(),
      isReadable: z.boolean(),
      isWritable: z.boolean(),
      size: z.number().int(),
      children: nullable(z.array(pathInfoSchema)),
    })
    .transform((wire) => ({
      path: wire.path,
      name: wire.name,
      isText: wire.isTextFile,
      isConfig: wire.isConfigFile,
      isDirectory: wire.isDirectory,
      isLog: wire.isLog,
      isReadable: wire.isReadable,
      isWritable: wire.isWritable,
      size: wire.size,
      children: wire.children,
    })),
);

/** Depth-first walk over a node and all of its descendants. */
export function* walkPathInfo(node: PathInfo): Generator<PathInfo> {
  yield node;
  for (const child of node.children ?? []) {
    yield* walkPathInfo(child);
  }
}
