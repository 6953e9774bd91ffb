// Decides which departments an emergency call needs

import type { EmergencyCall } from '../../core/schemas.js';

/**
 * Maps a call to the department names that should handle it. Implementations
 * may consult outside services, hence the promise.
 */
export interface EmergencyClassifier {
  classify(call: EmergencyCall): Promise<string[]>;
}

const BY_TYPE: Record<string, string> = {
  fire: 'fire_department',
  rescue: 'fire_department',
  crime: 'police_department',
  accident: 'police_department',
  // EMS runs out of the fire stations
  medical: 'fire_department',
  water_emergency: 'water_department',
  animal_emergency: 'animal_control_department',
  transportation_emergency: 'transportation_department',
  environmental_emergency: 'environmental_services_department',
  parks_emergency: 'parks_department',
  sanitation_emergency: 'sanitation_department'
};

type KeywordRule = [RegExp, string];

const INFRASTRUCTURE_KEYWORDS: KeywordRule[] = [
  [/water|sewer|pipe|hydrant/, 'water_management_department'],
  [/power|electric|gas|utility/, 'utilities_department'],
  [/road|street|traffic|bridge/, 'transportation_department']
];

const OTHER_KEYWORDS: KeywordRule[] = [
  [/animal|dog|cat|wildlife/, 'animal_control_department'],
  [/building|structure|construction/, 'building_inspection_department'],
  [/park|tree|playground/, 'parks_recreation_department']
];

function matchKeywords(description: string, rules: KeywordRule[], otherwise: string): string {
  const text = description.toLowerCase();
  for (const [pattern, department] of rules) {
    if (pattern.test(text)) {
      return department;
    }
  }
  return otherwise;
}

/**
 * Table-driven classification:
 *
 * 1. An explicitly requested department wins outright.
 * 2. The emergency type selects a department; `infrastructure` and `other`
 *    calls are narrowed down by keywords in the description.
 * 3. Weapons, suspects or critical severity add police; injuries, hazardous
 *    materials or fire add the fire department.
 */
export class RuleBasedClassifier implements EmergencyClassifier {
  constructor(private readonly defaultDepartment: string = 'police_department') {}

  async classify(call: EmergencyCall): Promise<string[]> {
    if (call.requested_department) {
      return [call.requested_department];
    }

    const departments = [this.primaryDepartment(call)];

    if ((call.weapons_involved || call.suspects_on_scene || call.severity === 'critical') &&
        !departments.includes('police_department')) {
      departments.push('police_department');
    }
    if ((call.injuries_reported || call.hazardous_materials || call.fire_involved) &&
        !departments.includes('fire_department')) {
      departments.push('fire_department');
    }

    return departments;
  }

  private primaryDepartment(call: EmergencyCall): string {
    const type = call.emergency_type.toLowerCase();

    if (type === 'infrastructure' || type === 'infrastructure_emergency') {
      return matchKeywords(call.description, INFRASTRUCTURE_KEYWORDS, 'public_works_department');
    }
    if (type === 'other') {
      return matchKeywords(call.description, OTHER_KEYWORDS, this.defaultDepartment);
    }
    return BY_TYPE[type] ?? this.defaultDepartment;
  }
}
