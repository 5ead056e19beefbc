/**
 * Option listing for -O
 */

import {
  AVAILABILITY_DEFAULTS,
  OPTION_KINDS,
  type AvailabilityConfig,
  type AvailabilityOptionName,
} from '../schemas/availability-config.js';
import { formatTable } from './table.js';

function describeDefault(value: AvailabilityConfig[AvailabilityOptionName]): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Option name / Default value table
 */
export function formatOptionsTable(defaults: AvailabilityConfig = AVAILABILITY_DEFAULTS): string {
  const names = Object.keys(OPTION_KINDS).filter(
    (name): name is AvailabilityOptionName => name in defaults
  );
  return formatTable(
    ['Option name', 'Default value'],
    names.map(name => [name, describeDefault(defaults[name])])
  );
}
