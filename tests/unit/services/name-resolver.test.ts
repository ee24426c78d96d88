/**
 * Unit tests for the name resolver
 */

import { describe, it, expect } from 'vitest';
import {
  compactName,
  findAttributeById,
  findDependencyById,
  normalizeName,
  resolveAttribute,
  resolveBusinessObject,
  resolveDependency,
  resolveField,
  resolveProcess,
} from '../../../src/services/name-resolver.js';
import { NotFoundError } from '../../../src/core/errors.js';
import type { AttributeMeta, BusinessObjectMeta, DependencyMeta } from '../../../src/types/metadata.js';

function attribute(boAttrId: string, name: string): AttributeMeta {
  return {
    boAttrId,
    name,
    type: 'string',
    rawType: 'String',
    isWriteable: true,
    isNullable: true,
    isUnique: false,
    isReference: false,
  };
}

function dependency(dependencyId: string, name: string): DependencyMeta {
  return { dependencyId, name, boMetaId: 'example_Position', referenceAttributeId: dependencyId };
}

const meta: BusinessObjectMeta = {
  boMetaId: 'example_Contact',
  name: 'Contact',
  canInsert: true,
  canUpdate: true,
  canDelete: true,
  attributes: [
    attribute('example_Contact_email', 'E-Mail'),
    attribute('example_Contact_firstName', 'First Name'),
    attribute('example_Contact_notes', 'Notes'),
  ],
  dependencies: [dependency('example_Note_contact', 'Notes'), dependency('example_Call_contact', 'Phone Calls')],
  processes: [{ processId: '7', name: 'Key Account' }],
};

describe('normalizeName', () => {
  it('should lower-case and turn spaces into underscores', () => {
    expect(normalizeName('First Name')).toBe('first_name');
    expect(normalizeName('E-Mail')).toBe('e-mail');
  });
});

describe('compactName', () => {
  it('should drop spaces, underscores and hyphens', () => {
    expect(compactName('E-Mail')).toBe('email');
    expect(compactName('first_name')).toBe('firstname');
    expect(compactName(' e mail ')).toBe('email');
  });
});

describe('resolveAttribute', () => {
  it.each(['email', 'Email', 'e mail', 'E-Mail', 'e_mail', 'E-MAIL'])(
    'should resolve %s to the E-Mail attribute',
    (name) => {
      const result = resolveAttribute(meta, name);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.boAttrId).toBe('example_Contact_email');
      }
    }
  );

  it('should treat spaces and underscores alike', () => {
    const bySpace = resolveAttribute(meta, 'first name');
    const byUnderscore = resolveAttribute(meta, 'FIRST_NAME');

    expect(bySpace.ok && bySpace.value.boAttrId).toBe('example_Contact_firstName');
    expect(byUnderscore.ok && byUnderscore.value.boAttrId).toBe('example_Contact_firstName');
  });

  it('should fail with NotFoundError for unknown names', () => {
    const result = resolveAttribute(meta, 'Fax');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(NotFoundError);
      expect(result.error).toMatchObject({ subject: 'attribute', key: 'Fax' });
      expect(result.error.message).toBe("Unknown attribute 'Fax'");
    }
  });

  it('should not match an empty name through the compact form', () => {
    expect(resolveAttribute(meta, '-').ok).toBe(false);
  });
});

describe('resolveField', () => {
  it('should prefer the attribute when a dependency has the same name', () => {
    const result = resolveField(meta, 'notes');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.kind).toBe('attribute');
    }
  });

  it('should resolve dependencies by normalized name', () => {
    const result = resolveField(meta, 'phone_calls');

    expect(result.ok).toBe(true);
    if (result.ok && result.value.kind === 'dependency') {
      expect(result.value.dependency.dependencyId).toBe('example_Call_contact');
    } else {
      expect.fail('expected a dependency');
    }
  });

  it('should report a field that is neither', () => {
    const result = resolveField(meta, 'Invoices');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatchObject({ subject: 'field', key: 'Invoices' });
    }
  });
});

describe('resolveDependency', () => {
  it('should ignore attributes', () => {
    const result = resolveDependency(meta, 'Notes');

    expect(result.ok && result.value.dependencyId).toBe('example_Note_contact');
  });
});

describe('resolveProcess', () => {
  it('should resolve processes by name', () => {
    const result = resolveProcess(meta, 'key account');

    expect(result.ok && result.value.processId).toBe('7');
  });

  it('should report unknown processes', () => {
    const result = resolveProcess(meta, 'Prospect');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatchObject({ subject: 'process', key: 'Prospect' });
    }
  });
});

describe('lookup by id', () => {
  it('should find the exact attribute id', () => {
    const result = findAttributeById(meta, 'example_Contact_email');

    expect(result.ok && result.value.name).toBe('E-Mail');
  });

  it('should not normalize ids', () => {
    expect(findAttributeById(meta, 'EXAMPLE_CONTACT_EMAIL').ok).toBe(false);
    expect(findAttributeById(meta, 'E-Mail').ok).toBe(false);
  });

  it('should find dependencies by exact id', () => {
    expect(findDependencyById(meta, 'example_Call_contact').ok).toBe(true);
    expect(findDependencyById(meta, 'Phone Calls').ok).toBe(false);
  });
});

describe('resolveBusinessObject', () => {
  const summaries = [
    { boMetaId: 'example_Customer', name: 'Customer' },
    { boMetaId: 'example_OrderPosition', name: 'Order Position' },
  ];

  it('should resolve type names like attribute names', () => {
    const result = resolveBusinessObject(summaries, 'order_position');

    expect(result.ok && result.value.boMetaId).toBe('example_OrderPosition');
  });

  it('should report unknown types', () => {
    const result = resolveBusinessObject(summaries, 'Invoice');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Unknown business object 'Invoice'");
    }
  });
});
