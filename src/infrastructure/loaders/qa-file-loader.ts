import { readFile } from "node:fs/promises";
import path from "node:path";
import matter from "gray-matter";
import YAML from "yaml";
import { z } from "zod";
import { Document } from "@langchain/core/documents";
import { BaseDocumentLoader } from "@langchain/core/document_loaders/base";
import { IOError, ValidationError } from "../../domain/common/errors";
import { parseQaText, type QaPair } from "../text/qa-parse";

export type QaFileFormat = "json" | "yaml" | "markdown" | "text";

export type QaFileLoaderOptions = {
  /** Override format. If omitted, inferred from file extension. */
  format?: QaFileFormat;
  /** Provenance tag for pairs that do not carry their own */
  source?: string;
};

export type QaDocumentMetadata = {
  answer: string;
  source: string;
  sourceUri: string;
};

const StructuredPairSchema = z.object({
  question: z.string().min(1),
  answer: z.string().min(1),
  source: z.string().min(1).optional(),
});

const StructuredFileSchema = z.union([
  z.array(StructuredPairSchema),
  z.object({
    source: z.string().min(1).optional(),
    pairs: z.array(StructuredPairSchema),
  }),
]);

type SourcedPair = QaPair & { source?: string };

export function inferQaFileFormat(filePath: string): QaFileFormat {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".json") return "json";
  if (ext === ".yaml" || ext === ".yml") return "yaml";
  if (ext === ".md" || ext === ".mdx") return "markdown";
  return "text";
}

/**
 * Loads question/answer import files into LangChain Documents, one per pair:
 * `pageContent` is the question, the answer and provenance go in metadata.
 *
 * - JSON / YAML: an array of `{ question, answer, source? }`, or
 *   `{ source?, pairs: [...] }`
 * - Markdown: front matter (`source`) parsed via `gray-matter`, body as Q/A text
 * - anything else: Q/A text (see parseQaText)
 */
export class QaFileLoader extends BaseDocumentLoader {
  private readonly filePath: string;
  private readonly options: QaFileLoaderOptions;

  constructor(filePath: string, options: QaFileLoaderOptions = {}) {
    super();
    this.filePath = filePath;
    this.options = options;
  }

  async load(): Promise<Document<QaDocumentMetadata>[]> {
    const abs = path.isAbsolute(this.filePath)
      ? this.filePath
      : path.join(process.cwd(), this.filePath);
    const format = this.options.format ?? inferQaFileFormat(abs);

    let raw: string;
    try {
      raw = await readFile(abs, "utf8");
    } catch (error) {
      throw new IOError(`Failed to read import file: ${abs}`, error, abs);
    }

    const { pairs, source } = this.parse(raw, format, abs);
    const fallbackSource = source ?? this.options.source ?? "import";
    return pairs.map(
      (p) =>
        new Document<QaDocumentMetadata>({
          pageContent: p.question,
          metadata: {
            answer: p.answer,
            source: p.source ?? fallbackSource,
            sourceUri: abs,
          },
        }),
    );
  }

  private parse(
    raw: string,
    format: QaFileFormat,
    abs: string,
  ): { pairs: SourcedPair[]; source?: string } {
    if (format === "markdown") {
      const parsed = matter(raw);
      const fm: unknown = parsed.data["source"];
      return {
        pairs: parseQaText(parsed.content),
        source: typeof fm === "string" && fm.trim() ? fm.trim() : undefined,
      };
    }
    if (format === "text") {
      return { pairs: parseQaText(raw) };
    }

    let data: unknown;
    try {
      data = format === "json" ? JSON.parse(raw) : YAML.parse(raw);
    } catch (error) {
      throw new IOError(`Failed to parse import file: ${abs}`, error, abs);
    }
    const parsed = StructuredFileSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("\n");
      throw new ValidationError(`Invalid import file ${abs}:\n${issues}`, parsed.error);
    }
    if (Array.isArray(parsed.data)) return { pairs: parsed.data };
    return { pairs: parsed.data.pairs, source: parsed.data.source };
  }
}
