/**
 * Request/response exchanges over the command characteristics.
 *
 * The command input and command result characteristics form a single shared
 * channel: two interleaved exchanges corrupt each other. Every exchange is
 * therefore chained behind the previous one.
 */

import { CommandExecutionError } from '../exceptions';
import { toHex, type Logger } from '../logger';
import type { BleLink } from '../transport/link';
import { encodeCommand, type Command } from './commands';
import { Characteristic } from './constants';
import { isCommandAck, validateCommandResult } from './responses';

export class CommandExecutor {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private link: BleLink,
    private logger: Logger = console
  ) {}

  /**
   * Run `task` once every previously queued exchange has settled.
   *
   * A failing task does not block the ones queued after it.
   */
  exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task, task);
    this.tail = run.catch(() => undefined);
    return run;
  }

  /**
   * Write a command and optionally verify the echoed opcode and status.
   *
   * @throws {CommandExecutionError} If the echo does not match or the transport fails
   */
  runCommand(command: Command, verify: boolean = false): Promise<void> {
    return this.exclusive(() => this.send(command, verify));
  }

  /**
   * Run a command and read its 21-byte output from the command result characteristic.
   *
   * @throws {CommandExecutionError} If the echo does not match or the transport fails
   * @throws {MalformedResultError} If the output is not 21 bytes
   */
  runCommandAndReadOutput(command: Command, verify: boolean = false): Promise<Uint8Array> {
    return this.exclusive(async () => {
      await this.send(command, verify);
      const data = await this.readResult(command);
      validateCommandResult(data, command.name);
      return data;
    });
  }

  /**
   * Write a command without taking the channel. Only for use inside {@link exclusive}.
   */
  async send(command: Command, verify: boolean): Promise<void> {
    const payload = encodeCommand(command);
    this.logger.debug(`-> ${command.name}: ${toHex(payload)}`);

    const echo = await this.transport(command, async () => {
      await this.link.write(Characteristic.commandInput, payload, true);
      return verify ? this.link.read(Characteristic.commandInput) : undefined;
    });

    if (echo && !isCommandAck(echo, command.opcode)) {
      this.logger.debug(`<- ${command.name} rejected: ${toHex(echo)}`);
      throw new CommandExecutionError(command.name);
    }
  }

  /**
   * Read the command result characteristic. Only for use inside {@link exclusive}.
   */
  async readResult(command: Command): Promise<Uint8Array> {
    const data = await this.transport(command, () =>
      this.link.read(Characteristic.commandResult)
    );
    this.logger.debug(`<- ${command.name}: ${toHex(data)}`);
    return data;
  }

  private async transport<T>(command: Command, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw new CommandExecutionError(command.name, { cause: error });
    }
  }
}
