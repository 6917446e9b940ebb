import { DoesNotExistError, Manager, Query, fromMapping } from '../../src';

type Person = {
  name: string;
  age: number | null;
  address: { city: string };
  tags: string[];
};

const people: Person[] = [
  { name: 'Alice', age: 30, address: { city: 'Lisbon' }, tags: ['admin'] },
  { name: 'Bob', age: 25, address: { city: 'Porto' }, tags: ['ops'] },
  { name: 'Cara', age: 25, address: { city: 'Lisbon' }, tags: ['ops', 'oncall'] },
  { name: 'Dan', age: null, address: { city: 'Braga' }, tags: [] },
];

async function main() {
  const manager = new Manager(people, { name: 'Person' });

  // Example 1: Filter and order
  console.log('=== Example 1: Filter and Order ===');
  const adults = await manager
    .filter({ age__gte: 25 })
    .orderBy('-age', 'name')
    .valuesList('name', 'age')
    .toArray();
  console.log('Rows:', adults);
  console.log();

  // Example 2: Nested paths and exclusions
  console.log('=== Example 2: Nested Paths ===');
  const outsideLisbon = await manager
    .exclude({ 'address.city': 'Lisbon' })
    .valuesFlat('name')
    .toArray();
  console.log('Outside Lisbon:', outsideLisbon);
  console.log();

  // Example 3: Structured result with totals
  console.log('=== Example 3: Paging ===');
  const page = await manager.orderBy('name').slice(0, 2).values('name', 'address.city').execute();
  console.log(`Showing ${page.items.length} of ${page.total}:`, page.items);
  console.log();

  // Example 4: Single record
  console.log('=== Example 4: get() ===');
  const bob = await manager.get({ name: 'Bob' });
  console.log(`${bob.name} is ${bob.age}`);
  try {
    await manager.get({ name: 'Eve' });
  }
  catch (error) {
    if (error instanceof DoesNotExistError) {
      console.log(error.message);
    }
    else {
      throw error;
    }
  }
  console.log();

  // Example 5: Settings as records
  console.log('=== Example 5: Settings ===');
  const settings = Query.from(fromMapping({ currency: 'EUR', locale: 'pt-PT', retries: 3 }));
  console.log('currency =', await settings.valuesFlat('value').get({ key: 'currency' }));
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
