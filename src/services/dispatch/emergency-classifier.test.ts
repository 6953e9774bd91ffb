/**
 * Tests for the rule-based emergency classifier
 */

import { describe, it, expect } from 'vitest';
import { RuleBasedClassifier } from './emergency-classifier.js';
import { EmergencyCallSchema } from '../../core/schemas.js';

function call(fields: Record<string, unknown>) {
  return EmergencyCallSchema.parse({ caller_location: '100 Main St', ...fields });
}

describe('RuleBasedClassifier', () => {
  const classifier = new RuleBasedClassifier();

  it.each<[string, string[]]>([
    ['fire', ['fire_department']],
    ['rescue', ['fire_department']],
    ['medical', ['fire_department']],
    ['crime', ['police_department']],
    ['accident', ['police_department']],
    ['water_emergency', ['water_department']],
    ['animal_emergency', ['animal_control_department']],
    ['sanitation_emergency', ['sanitation_department']],
    ['FIRE', ['fire_department']],
    ['alien_invasion', ['police_department']]
  ])('should classify %s calls', async (type, expected) => {
    expect(await classifier.classify(call({ emergency_type: type }))).toEqual(expected);
  });

  it.each<[string, string]>([
    ['Burst pipe flooding the basement', 'water_management_department'],
    ['Downed power line across the sidewalk', 'utilities_department'],
    ['Bridge railing collapsed', 'transportation_department'],
    ['Large crack in the retaining wall', 'public_works_department']
  ])('should narrow infrastructure calls by description: %s', async (description, expected) => {
    const departments = await classifier.classify(call({ emergency_type: 'infrastructure', description }));
    expect(departments).toEqual([expected]);
  });

  it.each<[string, string]>([
    ['Stray dog chasing cyclists', 'animal_control_department'],
    ['Abandoned building with open doors', 'building_inspection_department'],
    ['Fallen tree blocking the playground', 'parks_recreation_department'],
    ['Strange noises at night', 'police_department']
  ])('should narrow other calls by description: %s', async (description, expected) => {
    const departments = await classifier.classify(call({ emergency_type: 'other', description }));
    expect(departments).toEqual([expected]);
  });

  it('should honour an explicitly requested department over every rule', async () => {
    const departments = await classifier.classify(call({
      emergency_type: 'crime',
      requested_department: 'sanitation_department',
      weapons_involved: true
    }));
    expect(departments).toEqual(['sanitation_department']);
  });

  it('should add police for weapons and fire for injuries', async () => {
    const departments = await classifier.classify(call({
      emergency_type: 'parks_emergency',
      weapons_involved: true,
      injuries_reported: true
    }));
    expect(departments).toEqual(['parks_department', 'police_department', 'fire_department']);
  });

  it('should add police to critical calls once', async () => {
    expect(await classifier.classify(call({ emergency_type: 'fire', severity: 'critical' })))
      .toEqual(['fire_department', 'police_department']);
    expect(await classifier.classify(call({ emergency_type: 'crime', severity: 'critical', suspects_on_scene: true })))
      .toEqual(['police_department']);
  });

  it('should fall back to the configured default department', async () => {
    const custom = new RuleBasedClassifier('public_safety_department');
    expect(await custom.classify(call({ emergency_type: 'unknown' }))).toEqual(['public_safety_department']);
  });
});
