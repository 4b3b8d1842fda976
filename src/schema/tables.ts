/**
 * Health-insurance schema definition.
 *
 * The prompt catalog and the DDL that creates the store are both rendered from
 * these definitions, so the model always sees the tables that actually exist.
 */

export interface ColumnReference {
  table: string;
  column: string;
}

export interface ColumnDefinition {
  name: string;
  type: string;
  primaryKey?: boolean;
  unique?: boolean;
  defaultValue?: string;
  references?: ColumnReference;
}

export interface TableDefinition {
  name: string;
  description: string;
  columns: ColumnDefinition[];
}

export interface RelationshipDefinition {
  from: ColumnReference;
  to: ColumnReference;
}

export const POLICY_STATUSES = ['Active', 'Expired', 'Cancelled'] as const;
export const CLAIM_STATUSES = ['Pending', 'Approved', 'Denied', 'Paid'] as const;
export const PROSPECT_STATUSES = ['New', 'Contacted', 'Converted', 'Not Interested'] as const;
export const PROSPECT_SOURCES = ['Web', 'Referral', 'Advertisement', 'Cold Call', 'Email Campaign'] as const;

const id = (name: string): ColumnDefinition => ({ name, type: 'INTEGER', primaryKey: true });
const ref = (name: string, table: string): ColumnDefinition => ({
  name,
  type: 'INTEGER',
  references: { table, column: name },
});

export const TABLES: readonly TableDefinition[] = [
  {
    name: 'addresses',
    description: 'address information',
    columns: [
      id('address_id'),
      { name: 'street_address', type: 'VARCHAR(200)' },
      { name: 'city', type: 'VARCHAR(100)' },
      { name: 'state', type: 'VARCHAR(50)' },
      { name: 'zip_code', type: 'VARCHAR(20)' },
      { name: 'country', type: 'VARCHAR(100)', defaultValue: "'USA'" },
    ],
  },
  {
    name: 'customers',
    description: 'customer information',
    columns: [
      id('customer_id'),
      { name: 'first_name', type: 'VARCHAR(100)' },
      { name: 'last_name', type: 'VARCHAR(100)' },
      { name: 'date_of_birth', type: 'DATE' },
      { name: 'email', type: 'VARCHAR(200)' },
      { name: 'phone', type: 'VARCHAR(20)' },
      { name: 'ssn', type: 'VARCHAR(11)' },
      ref('address_id', 'addresses'),
    ],
  },
  {
    name: 'agents',
    description: 'agent information',
    columns: [
      id('agent_id'),
      { name: 'first_name', type: 'VARCHAR(100)' },
      { name: 'last_name', type: 'VARCHAR(100)' },
      { name: 'email', type: 'VARCHAR(200)' },
      { name: 'phone', type: 'VARCHAR(20)' },
      { name: 'hire_date', type: 'DATE' },
      ref('address_id', 'addresses'),
    ],
  },
  {
    name: 'policy_types',
    description: 'policy type information',
    columns: [
      id('type_id'),
      { name: 'name', type: 'VARCHAR(100)' },
      { name: 'description', type: 'TEXT' },
      { name: 'base_premium', type: 'FLOAT' },
      { name: 'coverage_limit', type: 'FLOAT' },
    ],
  },
  {
    name: 'policies',
    description: 'policy information',
    columns: [
      id('policy_id'),
      { name: 'policy_number', type: 'VARCHAR(50)', unique: true },
      ref('customer_id', 'customers'),
      ref('agent_id', 'agents'),
      ref('type_id', 'policy_types'),
      { name: 'start_date', type: 'DATE' },
      { name: 'end_date', type: 'DATE' },
      { name: 'premium', type: 'FLOAT' },
      { name: 'status', type: 'VARCHAR(20)' },
    ],
  },
  {
    name: 'claims',
    description: 'claim information',
    columns: [
      id('claim_id'),
      { name: 'claim_number', type: 'VARCHAR(50)', unique: true },
      ref('policy_id', 'policies'),
      ref('customer_id', 'customers'),
      { name: 'claim_date', type: 'DATETIME' },
      { name: 'description', type: 'TEXT' },
      { name: 'amount_claimed', type: 'FLOAT' },
      { name: 'amount_paid', type: 'FLOAT' },
      { name: 'status', type: 'VARCHAR(20)' },
    ],
  },
  {
    name: 'prospects',
    description: 'prospect information',
    columns: [
      id('prospect_id'),
      { name: 'first_name', type: 'VARCHAR(100)' },
      { name: 'last_name', type: 'VARCHAR(100)' },
      { name: 'email', type: 'VARCHAR(200)' },
      { name: 'phone', type: 'VARCHAR(20)' },
      { name: 'source', type: 'VARCHAR(100)' },
      { name: 'status', type: 'VARCHAR(50)' },
      { name: 'notes', type: 'TEXT' },
      { name: 'created_date', type: 'DATETIME' },
    ],
  },
];

export function relationships(tables: readonly TableDefinition[] = TABLES): RelationshipDefinition[] {
  return tables.flatMap((table) =>
    table.columns.flatMap((column) =>
      column.references ? [{ from: { table: table.name, column: column.name }, to: column.references }] : [],
    ),
  );
}
