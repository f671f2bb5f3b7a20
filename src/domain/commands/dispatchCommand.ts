import type { CommandContext, Command } from "./Command.js";

export async function dispatchCommand<TResult>(
  command: Command<TResult>,
  ctx: CommandContext,
): Promise<TResult> {
  const started = Date.now();

  try {
    ctx.logger?.debug?.(`[CMD] ${command.type}`, { command });
    const result = await command.execute(ctx);
    ctx.logger?.info?.(`[CMD OK] ${command.type}`, {
      ms: Date.now() - started,
    });
    return result;
  } catch (error) {
    ctx.logger?.warn?.(`[CMD ERR] ${command.type}`, { error });
    throw error;
  }
}
