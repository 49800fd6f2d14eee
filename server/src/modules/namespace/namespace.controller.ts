import type {
  FastifyInstance,
  FastifyReply,
  FastifyRequest,
  FastifyBaseLogger
} from "fastify";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { FileNode, FolderNode, RecycleBinRef, SearchMatch } from "../../types/namespace";
import type { NamespaceService } from "./namespace.service";
import type { NamespaceFailure } from "./namespace.errors";
import {
  AddFileBodySchema,
  BinRefBodySchema,
  FileBodySchema,
  FolderBodySchema,
  LookupQuerySchema,
  SearchBodySchema,
  TreeQuerySchema,
  type BinRefBody
} from "./namespace.schemas";
import { isNamespaceCorruptionError } from "./namespace.errors";

interface RegisterNamespaceControllerOptions {
  fastify: FastifyInstance;
  service: NamespaceService;
}

interface WireFile {
  name: string;
  type: "file";
  author: string;
  file_type: string;
  tags: string[];
  created_date: string;
}

interface WireFolder {
  name: string;
  type: "folder";
  children: WireFolder[];
  files: WireFile[];
}

function toWireFile(file: FileNode): WireFile {
  return {
    name: file.name,
    type: "file",
    author: file.author,
    file_type: file.fileType,
    tags: file.tags,
    created_date: file.createdDate
  };
}

function toWireFolder(folder: FolderNode): WireFolder {
  return {
    name: folder.name,
    type: "folder",
    children: folder.children.map(toWireFolder),
    files: folder.files.map(toWireFile)
  };
}

function toWireMatch(match: SearchMatch) {
  return {
    name: match.name,
    type: match.type,
    full_path: match.fullPath,
    ...(match.type === "file"
      ? { author: match.author, file_type: match.fileType, tags: match.tags }
      : {})
  };
}

function toBinRef(body: BinRefBody): RecycleBinRef {
  return "id" in body ? { id: body.id } : { index: body.index };
}

export function registerNamespaceController(options: RegisterNamespaceControllerOptions): void {
  const { fastify, service } = options;
  const log = fastify.log.child({ module: "namespace-controller" });

  fastify.get("/tree", async (request: FastifyRequest, reply: FastifyReply) => {
    const query = TreeQuerySchema.safeParse(request.query ?? {});
    if (!query.success) {
      return sendBadRequest(reply, query.error);
    }

    try {
      const tree = service.getTree({ sortByName: query.data.sort === "name" });
      return reply.send({ tree: toWireFolder(tree) });
    } catch (error) {
      return handleError(reply, error, "Failed to read the folder tree.", log);
    }
  });

  fastify.post("/folders", async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseInput(FolderBodySchema, request.body);
    if (!body.success) {
      return sendBadRequest(reply, body.error);
    }

    try {
      const result = service.createFolder(body.data.parent_path, body.data.folder_name);
      if (!result.ok) {
        return handleFailure(reply, result.error, log);
      }
      return reply
        .status(201)
        .send({ folder: toWireFolder(result.value.folder), path: result.value.path });
    } catch (error) {
      return handleError(reply, error, "Failed to create the folder.", log);
    }
  });

  fastify.delete("/folders", async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseInput(FolderBodySchema, request.body);
    if (!body.success) {
      return sendBadRequest(reply, body.error);
    }

    try {
      const result = service.deleteFolder(body.data.parent_path, body.data.folder_name);
      if (!result.ok) {
        return handleFailure(reply, result.error, log);
      }
      return reply.send({ entry: result.value });
    } catch (error) {
      return handleError(reply, error, "Failed to delete the folder.", log);
    }
  });

  fastify.post("/files", async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseInput(AddFileBodySchema, request.body);
    if (!body.success) {
      return sendBadRequest(reply, body.error);
    }

    try {
      const result = service.addFile(body.data.parent_path, body.data.file_name, {
        author: body.data.author,
        tags: body.data.tags,
        fileType: body.data.file_type
      });
      if (!result.ok) {
        return handleFailure(reply, result.error, log);
      }
      return reply
        .status(201)
        .send({ file: toWireFile(result.value.file), path: result.value.path });
    } catch (error) {
      return handleError(reply, error, "Failed to add the file.", log);
    }
  });

  fastify.delete("/files", async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseInput(FileBodySchema, request.body);
    if (!body.success) {
      return sendBadRequest(reply, body.error);
    }

    try {
      const result = service.deleteFile(body.data.parent_path, body.data.file_name);
      if (!result.ok) {
        return handleFailure(reply, result.error, log);
      }
      return reply.send({ entry: result.value });
    } catch (error) {
      return handleError(reply, error, "Failed to delete the file.", log);
    }
  });

  fastify.get("/files/lookup", async (request: FastifyRequest, reply: FastifyReply) => {
    const query = parseInput(LookupQuerySchema, request.query);
    if (!query.success) {
      return sendBadRequest(reply, query.error);
    }

    try {
      const result = service.lookupFile(query.data.parent_path, query.data.file_name);
      if (!result.ok) {
        return handleFailure(reply, result.error, log);
      }
      return reply.send({ file: toWireFile(result.value.file), full_path: result.value.fullPath });
    } catch (error) {
      return handleError(reply, error, "Failed to look up the file.", log);
    }
  });

  fastify.post("/search", async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseInput(SearchBodySchema, request.body ?? {});
    if (!body.success) {
      return sendBadRequest(reply, body.error);
    }

    try {
      const { tags } = body.data;
      const result = service.search({
        name: body.data.name,
        author: body.data.author,
        fileType: body.data.file_type,
        tags: Array.isArray(tags) ? tags.join(",") : tags
      });
      if (!result.ok) {
        return handleFailure(reply, result.error, log);
      }
      return reply.send({ results: result.value.map(toWireMatch) });
    } catch (error) {
      return handleError(reply, error, "Failed to search the tree.", log);
    }
  });

  fastify.get("/recycle-bin", async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      return reply.send({ items: service.listRecycleBin() });
    } catch (error) {
      return handleError(reply, error, "Failed to list the recycle bin.", log);
    }
  });

  fastify.post("/recycle-bin/restore", async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseInput(BinRefBodySchema, request.body);
    if (!body.success) {
      return sendBadRequest(reply, body.error);
    }

    try {
      const result = service.restoreFromRecycleBin(toBinRef(body.data));
      if (!result.ok) {
        return handleFailure(reply, result.error, log);
      }
      return reply.send({ restored: result.value });
    } catch (error) {
      return handleError(reply, error, "Failed to restore the item.", log);
    }
  });

  fastify.post("/recycle-bin/purge", async (request: FastifyRequest, reply: FastifyReply) => {
    const body = parseInput(BinRefBodySchema, request.body);
    if (!body.success) {
      return sendBadRequest(reply, body.error);
    }

    try {
      const result = service.permanentlyDelete(toBinRef(body.data));
      if (!result.ok) {
        return handleFailure(reply, result.error, log);
      }
      return reply.send({ purged: result.value });
    } catch (error) {
      return handleError(reply, error, "Failed to delete the item permanently.", log);
    }
  });

  fastify.delete("/recycle-bin", async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      const discarded = service.emptyRecycleBin();
      return reply.send({ discarded });
    } catch (error) {
      return handleError(reply, error, "Failed to empty the recycle bin.", log);
    }
  });
}

type ParsedInput<T> = { success: true; data: T } | { success: false; error: ZodError };

function parseInput<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): ParsedInput<T> {
  const result = schema.safeParse(input ?? {});
  return result.success
    ? { success: true, data: result.data }
    : { success: false, error: result.error };
}

function sendBadRequest(reply: FastifyReply, error: ZodError) {
  return reply.status(400).send({
    error: {
      code: "E_INVALID_INPUT",
      message: "Request is missing required fields or has fields of the wrong type.",
      details: error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message
      }))
    }
  });
}

const FAILURE_STATUS: Record<NamespaceFailure["kind"], number> = {
  InvalidInput: 400,
  InvalidQuery: 400,
  ForbiddenOperation: 403,
  NotFound: 404,
  ParentNotFound: 404,
  OriginalLocationMissing: 404,
  IndexOutOfRange: 404,
  DuplicateName: 409
};

function failureCode(failure: NamespaceFailure): string {
  return `E_${failure.kind.replace(/([a-z])([A-Z])/g, "$1_$2").toUpperCase()}`;
}

function describeFailure(failure: NamespaceFailure): string {
  switch (failure.kind) {
    case "NotFound":
      if (failure.target === "path") {
        return failure.segment === null
          ? `Path "${failure.path}" is empty.`
          : `Folder "${failure.segment}" not found in path "${failure.path}".`;
      }
      if (failure.target === "entry") {
        return `Recycle bin entry "${failure.id}" not found.`;
      }
      return `${failure.target === "folder" ? "Folder" : "File"} "${failure.name}" not found in "${failure.path}".`;
    case "ParentNotFound":
      return failure.segment === null
        ? "Parent path is empty."
        : `Parent folder not found at path: ${failure.path} (no folder "${failure.segment}").`;
    case "DuplicateName":
      return `A ${failure.nodeType} named "${failure.name}" already exists in "${failure.path}".`;
    case "ForbiddenOperation":
      return failure.operation === "delete-root"
        ? "Cannot delete the root folder."
        : `The name "${failure.name}" is reserved in "${failure.path}".`;
    case "OriginalLocationMissing":
      return `Original parent folder "${failure.parentPath}" no longer exists. Cannot restore.`;
    case "IndexOutOfRange":
      return `Recycle bin index ${failure.index} is out of range (${failure.size} item(s)).`;
    case "InvalidQuery":
      return "Provide at least one search criterion.";
    case "InvalidInput":
      return failure.reason === "contains-separator"
        ? `Field ${failure.field} must not contain "/".`
        : `Field ${failure.field} is required.`;
  }
}

function handleFailure(reply: FastifyReply, failure: NamespaceFailure, log: FastifyBaseLogger) {
  const message = describeFailure(failure);
  log.warn({ failure }, message);

  return reply.status(FAILURE_STATUS[failure.kind]).send({
    error: {
      code: failureCode(failure),
      message,
      details: failure
    }
  });
}

function handleError(
  reply: FastifyReply,
  error: unknown,
  fallbackMessage: string,
  log: FastifyBaseLogger
) {
  if (isNamespaceCorruptionError(error)) {
    log.error({ err: error }, error.message);

    return reply.status(500).send({
      error: {
        code: error.code,
        message: error.message
      }
    });
  }

  log.error({ err: error }, fallbackMessage);

  return reply.status(500).send({
    error: {
      code: "E_INTERNAL",
      message: fallbackMessage
    }
  });
}
