import { Registries } from '../core/registry';
import { ebs } from './ebs';
import { ec2 } from './ec2';
import { s3 } from './s3';

/**
 * Build a fresh set of registries holding the built-in resource types
 */
export function loadResources(): Registries {
  return new Registries().add(ec2()).add(ebs()).add(s3());
}
