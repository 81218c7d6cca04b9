import fsPromises from "fs/promises";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { DrugDataError } from "../errors";
import type { DrugPair } from "../quiz/types";

const REQUIRED_COLUMNS = ["brand", "generic"] as const;

const CsvRowsSchema = z.array(z.array(z.string()));

export const DrugPairSchema = z.object({
  brand: z.string().trim().min(1),
  generic: z.string().trim().min(1),
});

/**
 * Parse a brand/generic CSV into ordered drug pairs.
 *
 * Rows with an empty field, or repeating a brand or generic already seen,
 * are skipped with a warning. Missing columns throw.
 */
export const parseDrugCsv = (text: string, source = "<csv>"): DrugPair[] => {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (err) {
    throw new DrugDataError(`Could not parse CSV in ${source}`, { cause: err });
  }

  const rows = CsvRowsSchema.parse(parsed);
  const [header, ...body] = rows;

  if (!header) {
    throw new DrugDataError(`${source} is empty, expected a brand,generic header`);
  }

  const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length) {
    throw new DrugDataError(
      `${source} is missing required column(s): ${missing.join(", ")}`
    );
  }

  const brandAt = header.indexOf("brand");
  const genericAt = header.indexOf("generic");

  const seenBrands = new Set<string>();
  const seenGenerics = new Set<string>();
  const pairs: DrugPair[] = [];

  body.forEach((row, i) => {
    // header is line 1
    const line = i + 2;
    const result = DrugPairSchema.safeParse({
      brand: row[brandAt] ?? "",
      generic: row[genericAt] ?? "",
    });

    if (!result.success) {
      console.warn(`${source}:${line} skipped, brand and generic are required`);
      return;
    }

    const pair = result.data;
    if (seenBrands.has(pair.brand) || seenGenerics.has(pair.generic)) {
      console.warn(
        `${source}:${line} skipped, duplicate of an earlier row (${pair.brand} / ${pair.generic})`
      );
      return;
    }

    seenBrands.add(pair.brand);
    seenGenerics.add(pair.generic);
    pairs.push(pair);
  });

  return pairs;
};

export const loadDrugs = async (csvPath: string): Promise<DrugPair[]> => {
  let text: string;
  try {
    text = await fsPromises.readFile(csvPath, "utf8");
  } catch (err) {
    throw new DrugDataError(`Unable to read drug list at ${csvPath}`, {
      cause: err,
    });
  }
  return parseDrugCsv(text, csvPath);
};
