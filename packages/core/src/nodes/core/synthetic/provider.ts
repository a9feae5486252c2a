// src/nodes/core/synthetic/provider.ts
// Value generation behind an interface so tests can pin the output

import { Faker, en } from '@faker-js/faker';

export const SYNTHETIC_CATEGORIES = [
  'text',
  'word',
  'sentence',
  'first_name',
  'last_name',
  'full_name',
  'email',
  'phone',
  'age',
  'integer',
  'float',
  'date',
  'datetime',
  'address',
  'city',
  'country',
  'zipcode',
  'url',
  'username',
  'password',
  'uuid',
  'boolean',
  'programming_language',
  'database',
  'os',
] as const;

export type SyntheticCategory = (typeof SYNTHETIC_CATEGORIES)[number];

export interface GenerationBounds {
  min?: number;
  max?: number;
}

export interface SyntheticDataProvider {
  /** One value of the category. Unknown categories produce a word. */
  generate(category: string, bounds: GenerationBounds): unknown;
}

/** Bounds with min <= max; reversed bounds are swapped. */
export function orderBounds(bounds: GenerationBounds): GenerationBounds {
  const { min, max } = bounds;
  if (min !== undefined && max !== undefined && min > max) {
    return { min: max, max: min };
  }
  return bounds;
}

const PROGRAMMING_LANGUAGES = ['TypeScript', 'JavaScript', 'Python', 'Go', 'Rust', 'Java', 'C#', 'Kotlin', 'Ruby', 'Swift'];
const OPERATING_SYSTEMS = ['Linux', 'macOS', 'Windows', 'FreeBSD', 'Android', 'iOS'];

function fitLength(text: string, bounds: GenerationBounds, pad: () => string): string {
  let out = text;
  if (bounds.min !== undefined) {
    while (out.length < bounds.min) {
      out = `${out} ${pad()}`;
    }
  }
  return bounds.max !== undefined ? out.slice(0, bounds.max) : out;
}

/**
 * Default provider backed by @faker-js/faker. Pass a seed for repeatable output.
 */
export class FakerDataProvider implements SyntheticDataProvider {
  private readonly faker: Faker;

  constructor(options: { seed?: number } = {}) {
    this.faker = new Faker({ locale: [en] });
    if (options.seed !== undefined) {
      this.faker.seed(options.seed);
    }
  }

  generate(category: string, requested: GenerationBounds): unknown {
    const f = this.faker;
    const bounds = orderBounds(requested);
    switch (category) {
      case 'text':
        return fitLength(f.lorem.paragraph(), bounds, () => f.lorem.word());
      case 'word':
        return fitLength(f.lorem.word(), bounds, () => f.lorem.word());
      case 'sentence':
        return fitLength(f.lorem.sentence(), { max: bounds.max }, () => '');
      case 'first_name':
        return f.person.firstName();
      case 'last_name':
        return f.person.lastName();
      case 'full_name':
        return f.person.fullName();
      case 'email':
        return f.internet.email();
      case 'phone':
        return f.phone.number();
      case 'age':
        return f.number.int({ min: bounds.min ?? 18, max: bounds.max ?? 80 });
      case 'integer':
        return f.number.int({ min: bounds.min ?? 1, max: bounds.max ?? 100 });
      case 'float':
        return f.number.float({ min: bounds.min ?? 0, max: bounds.max ?? 100, fractionDigits: 2 });
      case 'date':
        return f.date.anytime().toISOString().slice(0, 10);
      case 'datetime':
        return f.date.anytime().toISOString();
      case 'address':
        return f.location.streetAddress({ useFullAddress: true });
      case 'city':
        return f.location.city();
      case 'country':
        return f.location.country();
      case 'zipcode':
        return f.location.zipCode();
      case 'url':
        return f.internet.url();
      case 'username':
        return f.internet.username();
      case 'password':
        return f.internet.password({ length: bounds.max ?? 12 });
      case 'uuid':
        return f.string.uuid();
      case 'boolean':
        return f.datatype.boolean();
      case 'programming_language':
        return f.helpers.arrayElement(PROGRAMMING_LANGUAGES);
      case 'database':
        return f.database.engine();
      case 'os':
        return f.helpers.arrayElement(OPERATING_SYSTEMS);
      default:
        return f.lorem.word();
    }
  }
}

let defaultProvider: SyntheticDataProvider | null = null;

export function getDefaultProvider(): SyntheticDataProvider {
  defaultProvider ??= new FakerDataProvider();
  return defaultProvider;
}
