import { READ_OUT_MEASUREMENTS, SAMPLE_DATA_SEED } from './constants';
import { COMPOUND_SCHEMA, SAMPLE_DATASETS, SampleDatasets } from './datasets';
import { Random } from './random';
import { createTable } from './table';
import { Row, Table } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

const REGIONS = ['North', 'South', 'East', 'West', 'Central'];
const PRODUCTS = ['Product A', 'Product B', 'Product C', 'Product D', 'Product E'];
const STOCK_SYMBOLS = ['AAPL', 'GOOGL', 'MSFT', 'AMZN', 'TSLA'];
const CITIES = ['New York', 'Los Angeles', 'Chicago', 'Houston', 'Phoenix'];
const TRADING_DAYS = 252;

export interface SampleDataOptions {
  seed?: number;
  now?: Date;
}

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function daysBefore(now: Date, days: number): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

function dayOfYear(date: Date): number {
  const start = Date.UTC(date.getUTCFullYear(), 0, 1);
  return Math.floor((date.getTime() - start) / DAY_MS) + 1;
}

function salesData(rng: Random, now: Date): Table {
  const rows: Row[] = [];
  for (let i = 0; i < 200; i++) {
    rows.push({
      date: isoDate(daysBefore(now, rng.int(0, 365))),
      region: rng.choice(REGIONS),
      product: rng.choice(PRODUCTS),
      sales_amount: Math.abs(rng.normal(1000, 300)),
      units_sold: rng.poisson(50),
      profit_margin: rng.uniform(0.1, 0.4),
    });
  }
  return createTable(SAMPLE_DATASETS.sales_data.schema, rows);
}

function stockData(rng: Random, now: Date): Table {
  const rows: Row[] = [];
  const baseDate = daysBefore(now, 365);

  for (const symbol of STOCK_SYMBOLS) {
    let price = rng.uniform(100, 500);

    for (let i = 0; i < TRADING_DAYS; i++) {
      price = price * (1 + rng.normal(0.001, 0.02));
      rows.push({
        date: isoDate(new Date(baseDate.getTime() + i * DAY_MS)),
        symbol,
        price: Math.abs(price),
        volume: rng.int(1_000_000, 9_999_999),
        market_cap: Math.abs(price * rng.int(1_000_000, 4_999_999)),
      });
    }
  }
  return createTable(SAMPLE_DATASETS.stock_prices.schema, rows);
}

function weatherData(rng: Random, now: Date): Table {
  const rows: Row[] = [];

  for (const city of CITIES) {
    const baseTemp = rng.uniform(10, 25);

    for (let i = 0; i < 365; i++) {
      const date = daysBefore(now, i);
      const seasonal = baseTemp + 15 * Math.sin((2 * Math.PI * dayOfYear(date)) / 365);
      rows.push({
        date: isoDate(date),
        city,
        temperature: seasonal + rng.normal(0, 5),
        humidity: rng.uniform(30, 90),
        precipitation: rng.exponential(2),
        wind_speed: rng.gamma(2, 2),
      });
    }
  }
  return createTable(SAMPLE_DATASETS.weather_data.schema, rows);
}

/**
 * Generate the sales, stock and weather sample tables. Same seed and `now`
 * give the same tables.
 */
export function generateSampleData(options: SampleDataOptions = {}): SampleDatasets {
  const rng = new Random(options.seed ?? SAMPLE_DATA_SEED);
  const now = options.now ?? new Date();

  return {
    sales_data: salesData(rng, now),
    stock_prices: stockData(rng, now),
    weather_data: weatherData(rng, now),
  };
}

const DEMO_COMPOUNDS = ['CPD-101', 'CPD-102', 'CPD-103', 'CPD-104', 'CPD-105'];
const DEMO_CONCENTRATIONS = [0.01, 0.1, 1, 10, 30];
const DEMO_SCREENS = [1, 2, 3];
const DEMO_REPLICATES = 4;

/**
 * Demo compound screening table: every read-out x compound x measurement x
 * screen x concentration, with a sigmoidal response plus noise.
 */
export function generateCompoundScreeningData(options: SampleDataOptions = {}): Table {
  const rng = new Random(options.seed ?? SAMPLE_DATA_SEED);
  const rows: Row[] = [];

  for (const [readOut, measurements] of READ_OUT_MEASUREMENTS) {
    for (const compound of DEMO_COMPOUNDS) {
      const ec50 = Math.pow(10, rng.uniform(-1.5, 1));
      for (const measurement of measurements) {
        const top = rng.uniform(50, 150);
        for (const screen of DEMO_SCREENS) {
          const shift = rng.normal(0, 5);
          for (const concentration of DEMO_CONCENTRATIONS) {
            const response = 100 + (top - 100) / (1 + ec50 / concentration) + shift;
            const stdev = Math.abs(rng.normal(6, 2));
            rows.push({
              read_out: readOut,
              compound,
              measurement_name: measurement,
              screen,
              concentration,
              average: response + rng.normal(0, 3),
              SEM: stdev / Math.sqrt(DEMO_REPLICATES),
              STDEV: stdev,
            });
          }
        }
      }
    }
  }

  return createTable(COMPOUND_SCHEMA, rows);
}
