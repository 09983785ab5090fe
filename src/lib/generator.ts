import { CsvAppendWriter, type CsvValue } from "./csv.js";
import { SeededRandom, randomInt, pick, lognormal, type RandomSource } from "./random.js";

export const SALES_COLUMNS = [
  "TransactionID",
  "OrderDate",
  "ProductID",
  "ProductName",
  "Category",
  "Price",
  "Quantity",
  "CustomerID",
  "Region",
] as const;

export const CATEGORIES = [
  "Electronics",
  "Clothing",
  "Home & Garden",
  "Sports",
  "Books",
  "Toys",
  "Health",
  "Automotive",
  "Food",
  "Beauty",
] as const;

export const REGIONS = ["North", "South", "East", "West", "Central"] as const;

export const PRODUCT_NAMES: readonly string[] = Array.from(
  { length: 1000 },
  (_, i) => `Product_${i + 1}`
);

export const DEFAULT_BATCH_SIZE = 100_000;
export const DEFAULT_SEED = 42;

const START_DATE_MS = Date.UTC(2020, 0, 1);
const WINDOW_HOURS = 365 * 4 * 24;
const HOUR_MS = 3_600_000;
/** Last instant a four-digit-year OrderDate can show; later clocks stick here. */
export const LATEST_ORDER_DATE_MS = Date.UTC(9999, 11, 31, 23, 59, 59);

export interface GenerateProgress {
  /** 1-based index of the batch just written. */
  batch: number;
  batches: number;
  rowsWritten: number;
}

export interface GenerateOptions {
  rows: number;
  outputPath: string;
  batchSize?: number;
  /** Ignored when `random` is given. */
  seed?: number;
  random?: RandomSource;
  /** Report every N batches (default 10). */
  progressEvery?: number;
  onProgress?: (progress: GenerateProgress) => void;
}

export interface GenerateResult {
  path: string;
  rows: number;
  batches: number;
  bytes: number;
}

/** One batch, column-major: each array holds `count` values. */
export interface SalesBatch {
  count: number;
  transactionIds: number[];
  orderDates: string[];
  productIds: number[];
  productNames: string[];
  categories: string[];
  prices: string[];
  quantities: number[];
  customerIds: number[];
  regions: string[];
}

/** Hours between consecutive OrderDates within a batch of `batchRows` rows. */
export function orderDateStepHours(batchRows: number): number {
  return Math.max(1, Math.floor(WINDOW_HOURS / batchRows));
}

export function formatOrderDate(ms: number): string {
  return new Date(Math.min(ms, LATEST_ORDER_DATE_MS)).toISOString().slice(0, 19).replace("T", " ");
}

function uniformInts(rand: RandomSource, count: number, min: number, maxExclusive: number): number[] {
  const out = new Array<number>(count);
  for (let i = 0; i < count; i++) out[i] = randomInt(rand, min, maxExclusive);
  return out;
}

function choices(rand: RandomSource, count: number, pool: readonly string[]): string[] {
  const out = new Array<string>(count);
  for (let i = 0; i < count; i++) out[i] = pick(rand, pool);
  return out;
}

function lognormalPrices(rand: RandomSource, count: number): string[] {
  const out = new Array<string>(count);
  for (let i = 0; i < count; i++) out[i] = lognormal(rand, 3, 1).toFixed(2);
  return out;
}

/**
 * Build rows `firstId .. firstId + count - 1`.
 * Columns are drawn one after another over the whole batch.
 */
export function buildBatch(
  rand: RandomSource,
  firstId: number,
  count: number,
  startMs: number
): SalesBatch {
  const step = orderDateStepHours(count) * HOUR_MS;
  const transactionIds = new Array<number>(count);
  const orderDates = new Array<string>(count);
  for (let i = 0; i < count; i++) {
    transactionIds[i] = firstId + i;
    orderDates[i] = formatOrderDate(startMs + i * step);
  }

  return {
    count,
    transactionIds,
    orderDates,
    productIds: uniformInts(rand, count, 1000, 9999),
    productNames: choices(rand, count, PRODUCT_NAMES),
    categories: choices(rand, count, CATEGORIES),
    prices: lognormalPrices(rand, count),
    quantities: uniformInts(rand, count, 1, 10),
    customerIds: uniformInts(rand, count, 10000, 99999),
    regions: choices(rand, count, REGIONS),
  };
}

export function batchRows(batch: SalesBatch): CsvValue[][] {
  const rows = new Array<CsvValue[]>(batch.count);
  for (let i = 0; i < batch.count; i++) {
    rows[i] = [
      batch.transactionIds[i],
      batch.orderDates[i],
      batch.productIds[i],
      batch.productNames[i],
      batch.categories[i],
      batch.prices[i],
      batch.quantities[i],
      batch.customerIds[i],
      batch.regions[i],
    ];
  }
  return rows;
}

function assertPositiveInt(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer (got ${value})`);
  }
}

/**
 * Write a synthetic sales CSV of exactly `rows` records.
 *
 * The file is truncated, the header written once, then each batch is
 * appended. Only one batch is held in memory at a time.
 */
export function generateSalesDataset(options: GenerateOptions): GenerateResult {
  const {
    rows,
    outputPath,
    batchSize = DEFAULT_BATCH_SIZE,
    seed = DEFAULT_SEED,
    progressEvery = 10,
    onProgress,
  } = options;
  assertPositiveInt("rows", rows);
  assertPositiveInt("batchSize", batchSize);

  const rand = options.random ?? new SeededRandom(seed);
  const batches = Math.ceil(rows / batchSize);
  const writer = new CsvAppendWriter(outputPath);

  try {
    writer.writeHeader(SALES_COLUMNS);

    let clock = START_DATE_MS;
    for (let b = 0; b < batches; b++) {
      const start = b * batchSize;
      const count = Math.min(batchSize, rows - start);
      const batch = buildBatch(rand, start + 1, count, clock);
      writer.append(batchRows(batch));
      clock = Math.min(clock + count * orderDateStepHours(count) * HOUR_MS, LATEST_ORDER_DATE_MS);

      if (onProgress && (b + 1) % progressEvery === 0) {
        onProgress({ batch: b + 1, batches, rowsWritten: start + count });
      }
    }
  } finally {
    writer.close();
  }

  return { path: outputPath, rows, batches, bytes: writer.bytes };
}
