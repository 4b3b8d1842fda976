export const EXAMPLE_QUESTIONS: readonly string[] = [
  'Show me all active policies with their customer names',
  'List all claims with amounts over $1000',
  'Find the top 5 customers by total premium paid',
  'Show the number of policies by type',
  'List all claims with customer and policy details',
];
