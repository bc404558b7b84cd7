import chalk from 'chalk';

export type ErrorCode =
  | 'PATH_CONFLICT'
  | 'KEY_NOT_FOUND'
  | 'INSUFFICIENT_SPACE'
  | 'OPEN_FAILED'
  | 'MOUNT_FAILED'
  | 'UNMOUNT_BUSY'
  | 'KEY_FILE_NOT_FOUND'
  | 'USER_DECLINED'
  | 'ROTATION_INCONSISTENT'
  | 'LAST_KEYSLOT'
  | 'CONTAINER_EXISTS'
  | 'CONTAINER_NOT_FOUND'
  | 'CONTAINER_BUSY'
  | 'INVALID_SIZE'
  | 'INVALID_CONTAINER_NAME'
  | 'PROVIDER_COMMAND_FAILED'
  | 'CONFIG_ERROR'
  | 'SEAL_ERROR';

export class CofferError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public suggestions?: string[]
  ) {
    super(message);
    this.name = 'CofferError';
  }
}

export class PathConflictError extends CofferError {
  constructor(path: string, reason?: string) {
    super(`Cannot create ${path}${reason ? `: ${reason}` : ''}`, 'PATH_CONFLICT', [
      'Check that no regular file occupies the directory path',
      'Check permissions on the parent directory',
    ]);
  }
}

export class KeyNotFoundError extends CofferError {
  constructor(path: string) {
    super(`Key file not found: ${path}`, 'KEY_NOT_FOUND', [
      'Pass the key explicitly with --key <path>',
      'Run `coffer keys generate <name>` if the container has no key pair yet',
    ]);
  }
}

export class InsufficientSpaceError extends CofferError {
  constructor(root: string, requiredBytes: number, availableBytes: number) {
    super(
      `Not enough free space in ${root}: ${requiredBytes} bytes required, ${availableBytes} available`,
      'INSUFFICIENT_SPACE',
      ['Choose a smaller size with --size', 'Set paths.containerRoot to a larger filesystem']
    );
  }
}

export class OpenFailedError extends CofferError {
  constructor(containerPath: string, keyFilePath: string, detail?: string) {
    super(
      `Failed to open ${containerPath} with key ${keyFilePath}${detail ? `: ${detail}` : ''}`,
      'OPEN_FAILED',
      [
        'Check that this key is enrolled with `coffer keys list <name>`',
        'Try the master key with `coffer open <name> --master`',
      ]
    );
  }
}

export class MountFailedError extends CofferError {
  constructor(devicePath: string, mountPath: string, detail?: string) {
    super(
      `Failed to mount ${devicePath} at ${mountPath}${detail ? `: ${detail}` : ''}`,
      'MOUNT_FAILED',
      [`The mount directory ${mountPath} was left in place for inspection`]
    );
  }
}

export class UnmountBusyError extends CofferError {
  constructor(
    public mountPath: string,
    public holders: string[]
  ) {
    super(
      `Mount point ${mountPath} is busy${holders.length > 0 ? ` (held by ${holders.join(', ')})` : ''}`,
      'UNMOUNT_BUSY',
      ['Close the programs using the volume and retry', 'Or confirm a forced detach when prompted']
    );
  }
}

export class KeyFileNotFoundError extends CofferError {
  constructor(path: string, role: string) {
    super(`${role} key file not found: ${path}`, 'KEY_FILE_NOT_FOUND', [
      'Check the path and that the key store is intact',
    ]);
  }
}

export class UserDeclinedError extends CofferError {
  constructor(action: string) {
    super(`Declined: ${action}`, 'USER_DECLINED');
  }
}

export interface RotationOutcome {
  name: string;
  enrolled: boolean;
  oldSlotRemoved: boolean;
  error?: string;
}

export class RotationInconsistentError extends CofferError {
  constructor(
    message: string,
    public outcomes: RotationOutcome[],
    pendingKeyPath: string
  ) {
    super(`Master key rotation incomplete: ${message}`, 'ROTATION_INCONSISTENT', [
      'The canonical master key was NOT replaced',
      `The pending master key is kept at ${pendingKeyPath}`,
      'Every container remains openable with its own container key',
      'Fix the failing container and rerun `coffer keys rotate-master`',
    ]);
  }
}

export class LastKeyslotError extends CofferError {
  constructor(containerPath: string) {
    super(`Refusing to remove the last keyslot of ${containerPath}`, 'LAST_KEYSLOT', [
      'Enroll another key first with `coffer keys add`',
    ]);
  }
}

export class ContainerExistsError extends CofferError {
  constructor(path: string, what = 'Container') {
    super(`${what} already exists: ${path}`, 'CONTAINER_EXISTS', [
      'Pick another name',
      'Use `coffer open <name>` to open the existing container',
    ]);
  }
}

export class ContainerNotFoundError extends CofferError {
  constructor(path: string) {
    super(`Container not found: ${path}`, 'CONTAINER_NOT_FOUND', [
      'Run `coffer list` to see available containers',
      'Run `coffer create <name> --size <size>` to create one',
    ]);
  }
}

export class ContainerBusyError extends CofferError {
  constructor(name: string, reason: string) {
    super(`Container ${name} is busy: ${reason}`, 'CONTAINER_BUSY', [
      `Run \`coffer close ${name}\` first`,
    ]);
  }
}

export class InvalidSizeError extends CofferError {
  constructor(value: string) {
    super(`Invalid container size: ${value}`, 'INVALID_SIZE', [
      'Give a whole number of MiB, or a value with a unit such as 512M or 2G',
    ]);
  }
}

export class InvalidContainerNameError extends CofferError {
  constructor(name: string, reason: string) {
    super(`Invalid container name "${name}": ${reason}`, 'INVALID_CONTAINER_NAME', [
      'Use letters, digits, dots, dashes and underscores (max 64 characters)',
    ]);
  }
}

export class ProviderCommandError extends CofferError {
  constructor(
    public command: string,
    public exitCode: number | null,
    public stderr: string
  ) {
    super(
      `${command} failed${exitCode === null ? '' : ` with exit code ${exitCode}`}${
        stderr ? `: ${stderr.trim()}` : ''
      }`,
      'PROVIDER_COMMAND_FAILED'
    );
  }
}

export class ConfigError extends CofferError {
  constructor(message: string) {
    super(`Configuration error: ${message}`, 'CONFIG_ERROR', [
      'Run `coffer config show` to inspect configuration',
      'Run `coffer config reset` to restore defaults',
    ]);
  }
}

export class SealError extends CofferError {
  constructor(message: string, suggestions?: string[]) {
    super(`Seal error: ${message}`, 'SEAL_ERROR', suggestions);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const handleError = (error: unknown): never => {
  if (error instanceof UserDeclinedError) {
    console.error(chalk.dim(error.message));
    process.exit(0);
  }

  if (error instanceof CofferError) {
    console.error(chalk.red('x'), error.message);
    if (error.suggestions && error.suggestions.length > 0) {
      console.error();
      console.error(chalk.dim('Suggestions:'));
      error.suggestions.forEach((s) => console.error(chalk.dim(`  → ${s}`)));
    }
    process.exit(1);
  }

  if (error instanceof Error) {
    console.error(chalk.red('x'), 'An unexpected error occurred:', error.message);
    if (process.env.DEBUG) {
      console.error(error.stack);
    }
    process.exit(1);
  }

  console.error(chalk.red('x'), 'An unknown error occurred');
  process.exit(1);
};
