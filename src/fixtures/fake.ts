import fs from 'fs-extra';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { pick, randomDigits, randomInt, type RandomSource } from './random.js';

const FixtureDataSchema = z.object({
  firstNames: z.array(z.string()).nonempty(),
  lastNames: z.array(z.string()).nonempty(),
  cities: z.array(z.string()).nonempty(),
  states: z.array(z.string()).nonempty(),
  streetNames: z.array(z.string()).nonempty(),
  streetSuffixes: z.array(z.string()).nonempty(),
  emailDomains: z.array(z.string()).nonempty(),
  words: z.array(z.string()).nonempty(),
});

export type FixtureData = z.infer<typeof FixtureDataSchema>;

const FIXTURE_FILE = fileURLToPath(new URL('../../data/fixtures.json', import.meta.url));

let cached: FixtureData | null = null;

export function loadFixtureData(): FixtureData {
  if (!cached) {
    cached = FixtureDataSchema.parse(fs.readJsonSync(FIXTURE_FILE));
  }
  return cached;
}

const DAY_MS = 24 * 60 * 60 * 1000;

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

export function formatDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

export function formatDateTime(date: Date): string {
  return `${formatDate(date)} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

export function addYears(date: Date, years: number): Date {
  const next = new Date(date.getTime());
  next.setUTCFullYear(next.getUTCFullYear() + years);
  return next;
}

/** Synthetic people, places and prose drawn from the fixture word lists. */
export class FakeData {
  constructor(
    private readonly random: RandomSource,
    private readonly data: FixtureData = loadFixtureData(),
  ) {}

  firstName(): string {
    return pick(this.random, this.data.firstNames);
  }

  lastName(): string {
    return pick(this.random, this.data.lastNames);
  }

  email(firstName: string, lastName: string): string {
    const local = `${firstName}.${lastName}${randomInt(this.random, 1, 99)}`.toLowerCase();
    return `${local}@${pick(this.random, this.data.emailDomains)}`;
  }

  phoneNumber(): string {
    return `(${randomInt(this.random, 200, 989)}) ${randomDigits(this.random, 3)}-${randomDigits(this.random, 4)}`;
  }

  ssn(): string {
    return `${pad(randomInt(this.random, 1, 899), 3)}-${pad(randomInt(this.random, 1, 99))}-${pad(randomInt(this.random, 1, 9999), 4)}`;
  }

  streetAddress(): string {
    const street = pick(this.random, this.data.streetNames);
    const suffix = pick(this.random, this.data.streetSuffixes);
    return `${randomInt(this.random, 1, 9999)} ${street} ${suffix}`;
  }

  city(): string {
    return pick(this.random, this.data.cities);
  }

  stateAbbr(): string {
    return pick(this.random, this.data.states);
  }

  zipCode(): string {
    return randomDigits(this.random, 5);
  }

  sentence(wordCount = randomInt(this.random, 4, 10)): string {
    const words = Array.from({ length: wordCount }, () => pick(this.random, this.data.words));
    const text = words.join(' ');
    return `${text.charAt(0).toUpperCase()}${text.slice(1)}.`;
  }

  paragraph(sentences = randomInt(this.random, 2, 4)): string {
    return Array.from({ length: sentences }, () => this.sentence()).join(' ');
  }

  /** Uniformly random instant in [start, end]. */
  dateBetween(start: Date, end: Date): Date {
    const span = Math.max(0, end.getTime() - start.getTime());
    return new Date(start.getTime() + Math.floor(this.random() * (span + 1)));
  }
}
