import type { ArtifactDescriptor, ComponentDefinition } from '../../types/index.js';

/**
 * Components of the benchmark stack, in declaration order.
 *
 * Declaration order is significant: dependency lists are walked in the order
 * written here, and dependents of equal rank are reported in the order their
 * components are declared.
 */

const NATIVE_ARTIFACTS: ArtifactDescriptor[] = [
  { type: 'package-config' },
  { type: 'archive' },
  { type: 'headers' }
];

function runnerArtifacts(language: string): ArtifactDescriptor[] {
  return [{ type: 'executable', name: `s3-${language}-runner` }];
}

export const COMPONENT_DEFINITIONS: readonly ComponentDefinition[] = [
  // Native dependencies, in build order
  { id: 'aws-c-common', kind: 'native-dependency', artifacts: NATIVE_ARTIFACTS },
  {
    id: 'aws-lc',
    kind: 'native-dependency',
    dependencies: ['aws-c-common'],
    artifacts: [
      { type: 'package-config' },
      { type: 'archive', library: 'crypto' },
      { type: 'headers', path: 'openssl' }
    ]
  },
  {
    id: 's2n',
    kind: 'native-dependency',
    dependencies: ['aws-c-common'],
    artifacts: [
      { type: 'package-config' },
      { type: 'archive' },
      { type: 'headers', path: 's2n' }
    ]
  },
  {
    id: 'aws-c-cal',
    kind: 'native-dependency',
    dependencies: ['aws-c-common', 'aws-lc', 's2n'],
    artifacts: NATIVE_ARTIFACTS
  },
  {
    id: 'aws-c-io',
    kind: 'native-dependency',
    dependencies: ['aws-c-common', 'aws-c-cal', 's2n'],
    artifacts: NATIVE_ARTIFACTS
  },
  { id: 'aws-checksums', kind: 'native-dependency', dependencies: ['aws-c-common'], artifacts: NATIVE_ARTIFACTS },
  { id: 'aws-c-compression', kind: 'native-dependency', dependencies: ['aws-c-common'], artifacts: NATIVE_ARTIFACTS },
  {
    id: 'aws-c-http',
    kind: 'native-dependency',
    dependencies: ['aws-c-common', 'aws-c-io', 'aws-c-compression'],
    artifacts: NATIVE_ARTIFACTS
  },
  { id: 'aws-c-sdkutils', kind: 'native-dependency', dependencies: ['aws-c-common'], artifacts: NATIVE_ARTIFACTS },
  {
    id: 'aws-c-auth',
    kind: 'native-dependency',
    dependencies: ['aws-c-common', 'aws-c-io', 'aws-c-http', 'aws-c-sdkutils', 'aws-c-cal'],
    artifacts: NATIVE_ARTIFACTS
  },

  // Native client
  {
    id: 'aws-c-s3',
    kind: 'native-client',
    dependencies: [
      'aws-c-common',
      'aws-lc',
      's2n',
      'aws-c-cal',
      'aws-c-io',
      'aws-checksums',
      'aws-c-compression',
      'aws-c-http',
      'aws-c-sdkutils',
      'aws-c-auth'
    ],
    artifacts: NATIVE_ARTIFACTS
  },

  // Managed-language clients: their toolchains track their own build state
  { id: 'aws-s3-transfer-manager-rs', kind: 'managed-client', artifacts: [{ type: 'toolchain-output', toolchain: 'cargo' }] },
  { id: 'aws-crt-python', kind: 'managed-client', artifacts: [{ type: 'toolchain-output', toolchain: 'pip' }] },
  { id: 'aws-crt-java', kind: 'managed-client', artifacts: [{ type: 'toolchain-output', toolchain: 'maven' }] },
  {
    id: 'aws-sdk-java-v2',
    kind: 'managed-client',
    dependencies: ['aws-crt-java'],
    artifacts: [{ type: 'toolchain-output', toolchain: 'maven' }]
  },

  // Runners depend on exactly the client they benchmark
  { id: 'runner-s3-c', kind: 'runner', dependencies: ['aws-c-s3'], artifacts: runnerArtifacts('c') },
  { id: 'runner-s3-rust', kind: 'runner', dependencies: ['aws-s3-transfer-manager-rs'], artifacts: runnerArtifacts('rust') },
  { id: 'runner-s3-python', kind: 'runner', dependencies: ['aws-crt-python'], artifacts: runnerArtifacts('python') },
  { id: 'runner-s3-java', kind: 'runner', dependencies: ['aws-sdk-java-v2'], artifacts: runnerArtifacts('java') }
];
