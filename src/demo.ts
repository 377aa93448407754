import path from 'path';
import { applyDeclaration } from './declaration';
import { sharedEngine } from './engine';
import { ValidationError } from './errors';
import { readJsonFile, readRecordFile } from './input';
import { DataRecord } from './record';
import { Validator } from './validator';

function examplePath(name: string): string {
  return path.join(__dirname, '..', 'examples', name);
}

function loadRecord(name: string): DataRecord {
  return new DataRecord(readRecordFile(examplePath(name)));
}

function attempt(label: string, record: DataRecord): void {
  try {
    record.save();
    console.log(`${label}: saved`);
  } catch (err) {
    if (!(err instanceof ValidationError)) throw err;
    console.log(`${label}: rejected`);
    Object.entries(err.errors).forEach(([field, message]) => console.log(`  - ${field}: ${message}`));
  }
}

const declaration = readJsonFile(examplePath('signup.rules.json'));

const valid = loadRecord('signup.valid.json');
applyDeclaration(new Validator(valid), declaration);
attempt('valid sign-up', valid);

const invalid = loadRecord('signup.invalid.json');
const validator = new Validator(invalid);
applyDeclaration(validator, declaration);
attempt('invalid sign-up', invalid);

console.log('\nBranches for the invalid sign-up:');
validator.explain(invalid).branches.forEach((trace) => {
  console.log(`- conditional #${trace.index}: ${trace.branch}`);
});

console.log('\nSame record in German:');
sharedEngine.lang('de');
attempt('invalid sign-up', invalid);

invalid.set({ account_type: 'personal', country: 'FR', zip: null });
console.log('\nAfter switching to a personal account in France:');
attempt('invalid sign-up', invalid);
