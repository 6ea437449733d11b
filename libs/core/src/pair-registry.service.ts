import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import fs from 'fs';
import path from 'path';
import { pairsFileSchema, TradingPair, tradingPairSchema } from './pair.schema';

export type AddPairResult = 'added' | 'duplicate';

/**
 * Operator-managed list of monitored pairs, persisted as `{ "pairs": [...] }`.
 * The polling loop reads `list()` at the start of every cycle, so edits made
 * through the dashboard apply without a restart.
 */
@Injectable()
export class PairRegistryService implements OnModuleInit {
  private readonly logger = new Logger(PairRegistryService.name);
  private readonly filePath: string;
  private readonly defaultPairs: string[];
  private pairs: TradingPair[] = [];
  private pendingWrite: Promise<void> = Promise.resolve();

  constructor(private readonly configService: ConfigService) {
    this.filePath = path.resolve(configService.get<string>('PAIRS_FILE', 'pairs.json'));
    this.defaultPairs = configService.get<string[]>('DEFAULT_PAIRS', ['BTC/USDT', 'ETH/USDT']);
  }

  async onModuleInit(): Promise<void> {
    await this.load();
  }

  async load(): Promise<TradingPair[]> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (!this.isMissingFile(error)) {
        throw error;
      }
      this.pairs = this.normalizeAll(this.defaultPairs);
      await this.persist();
      this.logger.log(`Created ${this.filePath} with ${this.pairs.length} default pairs`);
      return this.list();
    }

    const parsed = pairsFileSchema.parse(JSON.parse(raw));
    this.pairs = this.normalizeAll(parsed.pairs);
    this.logger.log(`Loaded ${this.pairs.length} pairs from ${this.filePath}`);
    return this.list();
  }

  list(): TradingPair[] {
    return [...this.pairs];
  }

  has(pair: TradingPair): boolean {
    return this.pairs.includes(pair);
  }

  /** Throws a ZodError when the input is not a `BASE/QUOTE` pair. */
  async add(input: string): Promise<{ pair: TradingPair; result: AddPairResult }> {
    const pair = tradingPairSchema.parse(input);
    if (this.pairs.includes(pair)) {
      return { pair, result: 'duplicate' };
    }
    this.pairs = [...this.pairs, pair];
    await this.persist();
    return { pair, result: 'added' };
  }

  async remove(input: string): Promise<{ pair: string; removed: boolean }> {
    const pair = input.trim().toUpperCase();
    if (!this.pairs.includes(pair)) {
      return { pair, removed: false };
    }
    this.pairs = this.pairs.filter((item) => item !== pair);
    await this.persist();
    return { pair, removed: true };
  }

  private normalizeAll(values: string[]): TradingPair[] {
    const unique = new Set<TradingPair>();
    for (const value of values) {
      const result = tradingPairSchema.safeParse(value);
      if (result.success) {
        unique.add(result.data);
      } else {
        this.logger.warn(JSON.stringify({ event: 'pair_ignored', value }));
      }
    }
    return Array.from(unique);
  }

  private persist(): Promise<void> {
    const body = `${JSON.stringify({ pairs: this.pairs }, null, 4)}\n`;
    const write = this.pendingWrite.then(async () => {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(this.filePath, body, 'utf8');
    });
    this.pendingWrite = write.catch((error: unknown) => {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(JSON.stringify({ event: 'pairs_write_failed', message }));
    });
    return write;
  }

  private isMissingFile(error: unknown): boolean {
    return (
      typeof error === 'object' &&
      error !== null &&
      'code' in error &&
      error.code === 'ENOENT'
    );
  }
}
