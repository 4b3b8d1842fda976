import type { Connection } from '../sqlite/db.js';
import { CLAIM_STATUSES, POLICY_STATUSES, PROSPECT_SOURCES, PROSPECT_STATUSES } from '../schema/tables.js';
import { addDays, addYears, FakeData, formatDate, formatDateTime } from './fake.js';
import { pick, randomDigits, randomInt, uniform, weightedPick, type RandomSource } from './random.js';

export const MIN_SEED_SIZE = 5;
const AGENT_COUNT = 5;
const PROSPECT_COUNT = 20;
const CLAIM_PROBABILITY = 0.3;

const POLICY_STATUS_WEIGHTS = [0.8, 0.15, 0.05];
const CLAIM_STATUS_WEIGHTS = [0.2, 0.3, 0.1, 0.4];

export interface PolicyTypeFixture {
  name: string;
  description: string;
  basePremium: number;
  coverageLimit: number;
}

export const POLICY_TYPES: readonly PolicyTypeFixture[] = [
  { name: 'Basic Health', description: 'Basic health insurance coverage', basePremium: 200, coverageLimit: 100_000 },
  { name: 'Family Plan', description: 'Health insurance for the whole family', basePremium: 500, coverageLimit: 500_000 },
  { name: 'Senior Care', description: 'Comprehensive coverage for seniors', basePremium: 350, coverageLimit: 300_000 },
  { name: 'Student Health', description: 'Affordable coverage for students', basePremium: 150, coverageLimit: 100_000 },
];

export interface SeedOptions {
  random?: RandomSource;
  now?: Date;
}

export interface SeedSummary {
  policyTypes: number;
  addresses: number;
  agents: number;
  customers: number;
  policies: number;
  claims: number;
  prospects: number;
}

function uniqueNumber(random: RandomSource, prefix: string, used: Set<string>): string {
  let value: string;
  do {
    value = `${prefix}-${randomDigits(random, 8)}`;
  } while (used.has(value));
  used.add(value);
  return value;
}

/**
 * Inserts a synthetic book of business. `size` is the number of addresses:
 * the first five house the agents, every other one a customer.
 * Runs in one transaction; nothing is written if any insert fails.
 */
export function createSampleData(connection: Connection, size = 50, options: SeedOptions = {}): SeedSummary {
  if (!Number.isInteger(size) || size < MIN_SEED_SIZE) {
    throw new Error(`Sample size must be an integer of at least ${MIN_SEED_SIZE}`);
  }

  const random = options.random ?? Math.random;
  const now = options.now ?? new Date();
  const fake = new FakeData(random);
  const policyNumbers = new Set<string>();
  const claimNumbers = new Set<string>();

  return connection.transaction(() => {
    const summary: SeedSummary = {
      policyTypes: 0,
      addresses: 0,
      agents: 0,
      customers: 0,
      policies: 0,
      claims: 0,
      prospects: 0,
    };

    POLICY_TYPES.forEach((type, i) => {
      connection.run(
        'INSERT INTO policy_types (type_id, name, description, base_premium, coverage_limit) VALUES (?, ?, ?, ?, ?)',
        [i + 1, type.name, type.description, type.basePremium, type.coverageLimit],
      );
      summary.policyTypes++;
    });

    for (let addressId = 1; addressId <= size; addressId++) {
      connection.run(
        'INSERT INTO addresses (address_id, street_address, city, state, zip_code, country) VALUES (?, ?, ?, ?, ?, ?)',
        [addressId, fake.streetAddress(), fake.city(), fake.stateAbbr(), fake.zipCode(), 'USA'],
      );
      summary.addresses++;
    }

    const agentIds: number[] = [];
    for (let agentId = 1; agentId <= AGENT_COUNT; agentId++) {
      const firstName = fake.firstName();
      const lastName = fake.lastName();
      connection.run(
        'INSERT INTO agents (agent_id, first_name, last_name, email, phone, hire_date, address_id) VALUES (?, ?, ?, ?, ?, ?, ?)',
        [
          agentId,
          firstName,
          lastName,
          fake.email(firstName, lastName),
          fake.phoneNumber(),
          formatDate(fake.dateBetween(addYears(now, -5), now)),
          agentId,
        ],
      );
      agentIds.push(agentId);
      summary.agents++;
    }

    let policyId = 0;
    let claimId = 0;
    for (let addressId = AGENT_COUNT + 1; addressId <= size; addressId++) {
      const customerId = addressId - AGENT_COUNT;
      const firstName = fake.firstName();
      const lastName = fake.lastName();
      connection.run(
        'INSERT INTO customers (customer_id, first_name, last_name, date_of_birth, email, phone, ssn, address_id) VALUES (?, ?, ?, ?, ?, ?, ?, ?)',
        [
          customerId,
          firstName,
          lastName,
          formatDate(fake.dateBetween(addYears(now, -90), addYears(now, -18))),
          fake.email(firstName, lastName),
          fake.phoneNumber(),
          fake.ssn(),
          addressId,
        ],
      );
      summary.customers++;

      const policyCount = randomInt(random, 1, 3);
      for (let p = 0; p < policyCount; p++) {
        const typeIndex = randomInt(random, 0, POLICY_TYPES.length - 1);
        const type = POLICY_TYPES[typeIndex];
        const startDate = new Date(`${formatDate(fake.dateBetween(addYears(now, -2), now))}T00:00:00Z`);
        policyId++;
        connection.run(
          'INSERT INTO policies (policy_id, policy_number, customer_id, agent_id, type_id, start_date, end_date, premium, status) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)',
          [
            policyId,
            uniqueNumber(random, 'POL', policyNumbers),
            customerId,
            pick(random, agentIds),
            typeIndex + 1,
            formatDate(startDate),
            formatDate(addDays(startDate, 365)),
            type.basePremium * (0.8 + random() * 0.4),
            weightedPick(random, POLICY_STATUSES, POLICY_STATUS_WEIGHTS),
          ],
        );
        summary.policies++;

        if (random() > 1 - CLAIM_PROBABILITY) {
          const claimCount = randomInt(random, 1, 4);
          for (let c = 0; c < claimCount; c++) {
            const amountClaimed = uniform(random, 100, type.coverageLimit * 0.1);
            claimId++;
            connection.run(
              'INSERT INTO claims (claim_id, claim_number, policy_id, customer_id, claim_date, description, amount_claimed, amount_paid, status) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)',
              [
                claimId,
                uniqueNumber(random, 'CLM', claimNumbers),
                policyId,
                customerId,
                formatDateTime(fake.dateBetween(startDate, now)),
                fake.sentence(),
                amountClaimed,
                amountClaimed * uniform(random, 0.7, 1.0),
                weightedPick(random, CLAIM_STATUSES, CLAIM_STATUS_WEIGHTS),
              ],
            );
            summary.claims++;
          }
        }
      }
    }

    for (let prospectId = 1; prospectId <= PROSPECT_COUNT; prospectId++) {
      const firstName = fake.firstName();
      const lastName = fake.lastName();
      connection.run(
        'INSERT INTO prospects (prospect_id, first_name, last_name, email, phone, source, status, notes, created_date) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)',
        [
          prospectId,
          firstName,
          lastName,
          fake.email(firstName, lastName),
          fake.phoneNumber(),
          pick(random, PROSPECT_SOURCES),
          pick(random, PROSPECT_STATUSES),
          fake.paragraph(),
          formatDateTime(now),
        ],
      );
      summary.prospects++;
    }

    return summary;
  });
}
