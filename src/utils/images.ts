import * as kplus from 'cdk8s-plus-33';
import { DEFAULT_IMAGES, ImageConfig } from '../config';

export type ImageName = keyof typeof DEFAULT_IMAGES;

/**
 * Resolve the image reference for a component, falling back to the pinned default
 */
export function resolveImage(images: ImageConfig | undefined, name: ImageName): string {
  return images?.[name] ?? DEFAULT_IMAGES[name];
}

/**
 * Map the configured pull policy onto the cdk8s-plus enum
 */
export function resolvePullPolicy(images: ImageConfig | undefined): kplus.ImagePullPolicy {
  switch (images?.pullPolicy) {
    case 'Always':
      return kplus.ImagePullPolicy.ALWAYS;
    case 'Never':
      return kplus.ImagePullPolicy.NEVER;
    default:
      return kplus.ImagePullPolicy.IF_NOT_PRESENT;
  }
}
