/**
 * Configuration validation utilities
 */

/**
 * Validate storage/memory size string format
 *
 * Supports Kubernetes binary units (1024-based):
 * - Ki (kibibytes), Mi (mebibytes), Gi (gibibytes), Ti (tebibytes), Pi (pebibytes), Ei (exbibytes)
 * - Decimal values: "1.5Gi", "0.5Mi"
 *
 * Note: Decimal units (k, M, G, T, P, E) are not currently supported due to cdk8s limitations.
 * Use binary equivalents instead: 1000M ≈ 954Mi, 1G ≈ 0.93Gi
 *
 * @param sizeStr - Size string to validate
 * @param fieldName - Field name for error messages
 * @throws Error if format is invalid
 *
 * @example
 * ```typescript
 * validateSizeFormat('5Gi', 'storage.shared.size')      // OK
 * validateSizeFormat('512Mi', 'resources.memory')      // OK
 * validateSizeFormat('1.5Gi', 'storage.size')          // OK
 * validateSizeFormat('invalid', 'storage.size')        // Throws error
 * validateSizeFormat('5', 'storage.size')              // Throws error (no unit)
 * ```
 */
export function validateSizeFormat(sizeStr: string, fieldName: string): void {
  // Pattern supports:
  // - Optional decimal: \d+(?:\.\d+)?
  // - Binary units: Ki|Mi|Gi|Ti|Pi|Ei (1024-based)
  const sizePattern = /^\d+(?:\.\d+)?(?:Ki|Mi|Gi|Ti|Pi|Ei)$/;
  if (!sizePattern.test(sizeStr)) {
    throw new Error(
      `Invalid size format for ${fieldName}: "${sizeStr}". ` +
      'Expected format: number + binary unit (e.g., "5Gi", "512Mi", "1.5Gi")',
    );
  }
}

/**
 * Validate CPU string format
 *
 * Supports all Kubernetes CPU formats:
 * - Millicores: "100m", "500m", "1000m"
 * - Cores: "1", "2", "0.5", "1.5"
 * - Note: 1 core = 1000 millicores
 *
 * @param cpuStr - CPU string to validate
 * @param fieldName - Field name for error messages
 * @throws Error if format is invalid
 *
 * @example
 * ```typescript
 * validateCpuFormat('100m', 'resources.cpu')    // OK (100 millicores)
 * validateCpuFormat('1000m', 'resources.cpu')   // OK (1000 millicores = 1 core)
 * validateCpuFormat('1', 'resources.cpu')       // OK (1 core)
 * validateCpuFormat('0.5', 'resources.cpu')     // OK (0.5 cores = 500m)
 * validateCpuFormat('1.5', 'resources.cpu')     // OK (1.5 cores = 1500m)
 * validateCpuFormat('abc', 'resources.cpu')     // Throws error
 * ```
 */
export function validateCpuFormat(cpuStr: string, fieldName: string): void {
  // Pattern supports:
  // - Millicores: \d+m (e.g., "100m", "1000m")
  // - Cores (integer or decimal): \d+(?:\.\d+)? (e.g., "1", "0.5", "1.5")
  const cpuPattern = /^(?:\d+m|\d+(?:\.\d+)?)$/;
  if (!cpuPattern.test(cpuStr)) {
    throw new Error(
      `Invalid CPU format for ${fieldName}: "${cpuStr}". ` +
      'Expected format: millicores (e.g., "100m", "500m") or cores (e.g., "1", "0.5", "1.5")',
    );
  }
}

/**
 * Validate domain name format
 *
 * @param domain - Domain name to validate
 * @param fieldName - Field name for error messages
 * @throws Error if format is invalid
 *
 * @example
 * ```typescript
 * validateDomainFormat('example.com', 'domain')           // OK
 * validateDomainFormat('blog.example.com', 'hostname')    // OK
 * validateDomainFormat('invalid domain', 'domain')        // Throws error
 * validateDomainFormat('example', 'domain')               // Throws error (no TLD)
 * ```
 */
export function validateDomainFormat(domain: string, fieldName: string): void {
  // RFC 1035 compliant domain name pattern
  // - Labels separated by dots
  // - Each label: 1-63 chars, alphanumeric + hyphens, cannot start/end with hyphen
  // - TLD: at least 2 chars, letters only
  const domainPattern = /^(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,}$/i;

  if (!domainPattern.test(domain)) {
    throw new Error(
      `Invalid domain format for ${fieldName}: "${domain}". ` +
      'Expected format: valid DNS name (e.g., "example.com", "blog.example.com")',
    );
  }
}

/**
 * Validate CIDR subnet format
 *
 * @param cidr - CIDR notation to validate
 * @param fieldName - Field name for error messages
 * @throws Error if format is invalid
 *
 * @example
 * ```typescript
 * validateCidrFormat('10.42.0.0/16', 'subnet')        // OK
 * validateCidrFormat('192.168.1.0/24', 'subnet')      // OK
 * validateCidrFormat('10.42.0.0', 'subnet')           // Throws error (no prefix)
 * validateCidrFormat('256.0.0.0/8', 'subnet')         // Throws error (invalid IP)
 * validateCidrFormat('10.42.0.0/33', 'subnet')        // Throws error (invalid prefix)
 * ```
 */
export function validateCidrFormat(cidr: string, fieldName: string): void {
  // IPv4 CIDR pattern: a.b.c.d/prefix
  // - Each octet: 0-255
  // - Prefix: 0-32
  const cidrPattern = /^(?:(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)\.){3}(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)\/(?:[0-9]|[12][0-9]|3[0-2])$/;

  if (!cidrPattern.test(cidr)) {
    throw new Error(
      `Invalid CIDR format for ${fieldName}: "${cidr}". ` +
      'Expected format: IPv4 CIDR notation (e.g., "10.42.0.0/16", "192.168.0.0/24")',
    );
  }
}

/**
 * Validate a Kubernetes object name (RFC 1123 label)
 *
 * @param name - Name to validate
 * @param fieldName - Field name for error messages
 * @throws Error if format is invalid
 *
 * @example
 * ```typescript
 * validateResourceName('wordpress', 'namespace')     // OK
 * validateResourceName('Word_Press', 'namespace')    // Throws error
 * ```
 */
export function validateResourceName(name: string, fieldName: string): void {
  const namePattern = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/;

  if (!namePattern.test(name)) {
    throw new Error(
      `Invalid resource name for ${fieldName}: "${name}". ` +
      'Expected lowercase alphanumerics and hyphens, at most 63 characters (e.g., "wordpress")',
    );
  }
}

/**
 * Validate a replica count
 *
 * @param replicas - Replica count to validate
 * @param fieldName - Field name for error messages
 * @param minimum - Smallest accepted value
 * @throws Error if not an integer or below the minimum
 */
export function validateReplicas(replicas: number, fieldName: string, minimum: number = 1): void {
  if (!Number.isInteger(replicas) || replicas < minimum) {
    throw new Error(
      `Invalid replica count for ${fieldName}: ${replicas}. ` +
      `Expected an integer >= ${minimum}`,
    );
  }
}

/**
 * Validate an autoscaling range
 *
 * @throws Error if either bound is invalid or min exceeds max
 */
export function validateReplicaRange(min: number, max: number, fieldName: string): void {
  validateReplicas(min, `${fieldName}.minReplicas`);
  validateReplicas(max, `${fieldName}.maxReplicas`);
  if (min > max) {
    throw new Error(
      `Invalid replica range for ${fieldName}: minReplicas (${min}) is greater than maxReplicas (${max})`,
    );
  }
}

/**
 * Validate a Prometheus duration (e.g. "30s", "5m", "1h30m")
 *
 * @param duration - Duration string to validate
 * @param fieldName - Field name for error messages
 * @throws Error if format is invalid
 *
 * @example
 * ```typescript
 * validateDurationFormat('30s', 'monitoring.scrapeInterval')  // OK
 * validateDurationFormat('1h30m', 'alerts.for')               // OK
 * validateDurationFormat('30', 'monitoring.scrapeInterval')   // Throws error (no unit)
 * ```
 */
export function validateDurationFormat(duration: string, fieldName: string): void {
  const durationPattern = /^(?:\d+(?:ms|s|m|h|d|w|y))+$/;

  if (!durationPattern.test(duration)) {
    throw new Error(
      `Invalid duration format for ${fieldName}: "${duration}". ` +
      'Expected format: number + unit (e.g., "30s", "5m", "1h30m")',
    );
  }
}

/**
 * Validate an integer setting such as a probe period or a utilisation target
 *
 * @throws Error if not an integer or below the minimum
 */
export function validateIntegerSetting(value: number, fieldName: string, minimum: number): void {
  if (!Number.isInteger(value) || value < minimum) {
    throw new Error(`Invalid value for ${fieldName}: ${value}. Expected an integer >= ${minimum}`);
  }
}

/**
 * Validate an alert threshold
 *
 * @param threshold - Value compared against in the alert expression
 * @param fieldName - Field name for error messages
 * @param isRatio - Whether the threshold is a fraction between 0 and 1
 * @throws Error if not a finite non-negative number, or a ratio outside [0, 1]
 *
 * @example
 * ```typescript
 * validateThreshold(3, 'alerts.podRestarts.threshold', false)              // OK
 * validateThreshold(0.8, 'alerts.mysqlTooManyConnections.threshold', true) // OK
 * validateThreshold(1.5, 'alerts.sharedVolumeFillingUp.threshold', true)   // Throws error
 * ```
 */
export function validateThreshold(threshold: number, fieldName: string, isRatio: boolean): void {
  if (!Number.isFinite(threshold) || threshold < 0) {
    throw new Error(`Invalid threshold for ${fieldName}: ${threshold}. Expected a finite number >= 0`);
  }
  if (isRatio && threshold > 1) {
    throw new Error(`Invalid threshold for ${fieldName}: ${threshold}. Expected a ratio between 0 and 1`);
  }
}
