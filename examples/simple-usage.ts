/**
 * Simple usage - one collection, several lookup paths
 */

import { POP, polydex, primary, produce, secondary } from '../packages/core/src/index';

interface User {
  name: string;
  age: number;
}

const byName = (user: User): string => user.name;

console.log('=== Polydex: Indexed Collections ===\n');

// ===== Create =====
console.log('1️⃣ Create a collection keyed by name');
let users = polydex<string, User>(
  [
    { name: 'Bob', age: 20 },
    { name: 'Eve', age: 27 },
    { name: 'John', age: 45 },
  ],
  byName
);
console.log(String(users));

// ===== Secondary indices =====
console.log('\n2️⃣ Add an eager and a lazy index');
users = users
  .createIndex('initial', user => user.name[0])
  .createIndex('age', user => user.age, { lazy: true });
console.log('By initial J:', users.get(secondary('initial', 'J')));
console.log('By age 27:', users.get(secondary('age', 27)));

// ===== Update =====
console.log('\n3️⃣ Rename Bob (primary key changes)');
const renamed = users.update(primary('Bob'), user => ({ ...user, name: 'Steve' }));
console.log('Steve:', renamed.get(primary('Steve')));
console.log('Bob:', renamed.fetch(primary('Bob')));
console.log('Original still has Bob:', users.has(primary('Bob')));
console.log('✅ Immutable - users unchanged');

// ===== get and update =====
console.log('\n4️⃣ getAndUpdate');
const [age, older] = renamed.getAndUpdateOrThrow(primary('Eve'), user => [user.age, { ...user, age: user.age + 1 }]);
console.log('Previous age:', age, '→ now', older.get(primary('Eve'))?.age);
const [removed, smaller] = older.getAndUpdateOrThrow(secondary('initial', 'J'), () => POP);
console.log('Removed:', removed, 'size:', smaller.size);

// ===== Batch =====
console.log('\n5️⃣ Batch edits with produce');
const batch = produce(smaller, draft => {
  draft.put({ name: 'Anna', age: 50 });
  draft.put({ name: 'Frank', age: 33 });
  draft.pop(primary('Steve'));
});
console.log(String(batch));

// ===== Drop =====
console.log('\n6️⃣ Drop an index');
const dropped = batch.dropIndex('initial');
console.log('Lookup through dropped index:', dropped.fetch(secondary('initial', 'A')));
