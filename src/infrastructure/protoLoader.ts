import fs from "fs";
import path from "path";
import protobuf from "protobufjs";
import { IoError, ValidationError, errorMessage } from "../domain/errors.js";
import type { ProtoPreflight } from "../domain/ports.js";
import type { ProtoConfig, TestDefinition } from "../domain/types.js";

function createRoot(importPaths: string[]): protobuf.Root {
  const root = new protobuf.Root();
  const exists = (p: string) => {
    try {
      return fs.statSync(p).isFile();
    } catch {
      return false;
    }
  };
  root.resolvePath = (origin, target) => {
    if (path.isAbsolute(target) && exists(target)) return target;

    if (origin) {
      const rel = path.resolve(path.dirname(origin), target);
      if (exists(rel)) return rel;
    }

    for (const dir of importPaths) {
      const fromImport = path.resolve(dir, target);
      if (exists(fromImport)) return fromImport;
    }

    return path.resolve(path.dirname(origin || importPaths[0] || "."), target);
  };
  return root;
}

export async function loadProtoFiles(files: string[], importPaths: string[]): Promise<protobuf.Root> {
  const root = createRoot(importPaths);
  return root.load(files, { keepCase: true });
}

export function hasMethod(root: protobuf.Root, endpoint: string): { service: boolean; method: boolean } {
  const [serviceName, methodName] = endpoint.split("/");
  const found = root.lookup(serviceName);
  if (!(found instanceof protobuf.Service)) return { service: false, method: false };
  return { service: true, method: Object.prototype.hasOwnProperty.call(found.methods, methodName) };
}

/**
 * Loads the proto files of `files`-mode definitions with protobufjs and checks
 * that the endpoint exists before grpcurl is started. Loaded roots are shared
 * between definitions that name the same files.
 */
export class ProtobufPreflight implements ProtoPreflight {
  private readonly roots = new Map<string, Promise<protobuf.Root>>();

  async check(definition: Pick<TestDefinition, "path" | "endpoint" | "proto">): Promise<void> {
    if (definition.proto.mode !== "files") return;
    const root = await this.load(definition.proto, definition.path);
    const { service, method } = hasMethod(root, definition.endpoint);
    const [serviceName, methodName] = definition.endpoint.split("/");
    if (!service) throw new ValidationError(`service ${serviceName} not found in ${definition.proto.files.join(", ")}`, definition.path);
    if (!method) throw new ValidationError(`method ${methodName} not found on service ${serviceName}`, definition.path);
  }

  private load(proto: ProtoConfig, file: string): Promise<protobuf.Root> {
    const key = JSON.stringify([proto.files, proto.importPaths]);
    let pending = this.roots.get(key);
    if (!pending) {
      pending = loadProtoFiles(proto.files, proto.importPaths).catch((e: unknown) => {
        this.roots.delete(key);
        throw new IoError(`cannot load proto files: ${errorMessage(e)}`, file, { cause: e });
      });
      this.roots.set(key, pending);
    }
    return pending;
  }
}
