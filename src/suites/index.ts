import { SuiteRegistry } from '../harness/registry';
import { aluSets } from './alu';
import { rclSets } from './rcl';
import { rotateSets } from './rotates';
import { shiftSets } from './shifts';

export function builtinRegistry(): SuiteRegistry {
  return new SuiteRegistry().register(...rclSets, ...rotateSets, ...shiftSets, ...aluSets);
}
