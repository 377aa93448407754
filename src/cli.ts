#!/usr/bin/env node
import { applyDeclaration, checkDeclaration } from './declaration';
import type { DeclarationResult, RuleDeclaration } from './declaration';
import { sharedEngine } from './engine';
import { FieldRulesError } from './errors';
import { readJsonFile, readRecordFile } from './input';
import { sharedLoader } from './loader';
import { DataRecord } from './record';
import { findDuplicateRules } from './resolver';
import type { RuleSet, RuleSpec } from './types';
import { Validator } from './validator';

function printUsage(): void {
  console.log(`Usage: field-rules <command> [options]

Commands:
  check <rules.json> --input <record.json>
                                Validate a record against a rule declaration
  explain <rules.json> --input <record.json>
                                Show which conditional branches apply and the resulting rules
  lint <rules.json>             Check a rule declaration without running it
  rules                         List the registered rule types and their messages

Options:
  --input <file>                Path to a JSON object with the record's field values
  --lang <locale>               Message locale (overrides the declaration's locale)
  --intent <tag>                Intent passed to the validate hook (default "save")
`);
}

function getOption(name: string, args: string[]): string | undefined {
  const flag = `--${name}`;
  const idx = args.indexOf(flag);
  if (idx === -1 || idx === args.length - 1) {
    return undefined;
  }
  return args[idx + 1];
}

function describeRule(spec: RuleSpec): string {
  const params = spec.params.length ? `(${spec.params.map((param) => JSON.stringify(param)).join(', ')})` : '';
  const message = spec.message ? ` "${spec.message}"` : '';
  return `${spec.name}${params}${message}`;
}

function printRuleSet(ruleSet: RuleSet): void {
  Object.entries(ruleSet).forEach(([field, rules]) => {
    console.log(`- ${field}: ${rules.map(describeRule).join(', ')}`);
  });
}

function report(result: DeclarationResult): boolean {
  if (result.valid) {
    console.log('Declaration is valid.');
  } else {
    console.error('Declaration has errors:');
    result.errors.forEach((err) => console.error(`- ${err}`));
  }

  if (result.warnings.length) {
    console.warn('\nWarnings:');
    result.warnings.forEach((warning) => console.warn(`- ${warning}`));
  }

  return result.valid;
}

function loadDeclaration(declarationPath: string): RuleDeclaration | undefined {
  const result = checkDeclaration(readJsonFile(declarationPath), sharedLoader.ruleNames());
  if (!report(result) || !result.declaration) {
    process.exitCode = 1;
    return undefined;
  }
  return result.declaration;
}

function prepare(args: string[], usage: string): { record: DataRecord; validator: Validator } | undefined {
  const declarationPath = args[0];
  const inputPath = getOption('input', args);
  if (!declarationPath || !inputPath) {
    console.error(`Usage: ${usage}`);
    process.exitCode = 1;
    return undefined;
  }

  const declaration = loadDeclaration(declarationPath);
  if (!declaration) return undefined;

  const locale = getOption('lang', args) ?? declaration.locale;
  if (locale) sharedEngine.lang(locale);

  const record = new DataRecord(readRecordFile(inputPath));
  const validator = new Validator(record);
  applyDeclaration(validator, declaration);
  return { record, validator };
}

function handleCheck(args: string[]): void {
  const prepared = prepare(args, 'check <rules.json> --input <record.json>');
  if (!prepared) return;

  const errors = prepared.record.validate(getOption('intent', args) ?? 'save');
  if (!errors) {
    console.log('\nNo errors.');
    return;
  }

  console.log('\nErrors:');
  Object.entries(errors).forEach(([field, message]) => console.log(`- ${field}: ${message}`));
  process.exitCode = 1;
}

function handleExplain(args: string[]): void {
  const prepared = prepare(args, 'explain <rules.json> --input <record.json>');
  if (!prepared) return;

  const { ruleSet, branches } = prepared.validator.explain(prepared.record);
  if (branches.length) {
    console.log('\nConditionals:');
    branches.forEach((trace) => {
      const checks = trace.why.fields
        .map((entry) => `${entry.field}=${JSON.stringify(entry.actual)} ${entry.matched ? '==' : '!='} ${JSON.stringify(entry.expected)}`)
        .join(', ');
      console.log(`- #${trace.index}: ${trace.branch} (${checks || 'no condition'})`);
    });
  }

  console.log('\nEffective rules:');
  printRuleSet(ruleSet);

  const duplicates = findDuplicateRules(ruleSet);
  if (duplicates.length) {
    console.warn('\nRepeated rules (each copy runs):');
    duplicates.forEach((entry) => console.warn(`- ${entry.field}: ${describeRule(entry.rule)} x${entry.count}`));
  }
}

function handleLint(args: string[]): void {
  const declarationPath = args[0];
  if (!declarationPath) {
    console.error('Usage: lint <rules.json>');
    process.exitCode = 1;
    return;
  }
  loadDeclaration(declarationPath);
}

function handleRules(args: string[]): void {
  const locale = getOption('lang', args);
  if (locale) sharedEngine.lang(locale);
  sharedLoader.ensureRegistered(sharedEngine);

  console.log(`Rule types (${sharedEngine.lang()}):`);
  sharedEngine.ruleTypes().forEach((type) => {
    console.log(`- ${type.name}${type.implicit ? ' [runs on empty values]' : ''}: ${type.message}`);
  });
}

function main(): void {
  const [, , command, ...args] = process.argv;

  try {
    switch (command) {
      case 'check':
        handleCheck(args);
        break;
      case 'explain':
        handleExplain(args);
        break;
      case 'lint':
        handleLint(args);
        break;
      case 'rules':
        handleRules(args);
        break;
      default:
        printUsage();
        process.exitCode = 1;
    }
  } catch (err) {
    if (!(err instanceof FieldRulesError)) throw err;
    console.error(`${err.code}: ${err.message}`);
    process.exitCode = 1;
  }
}

main();
