/**
 * Runs Lua script bodies in-process with fengari, the way EVAL runs them on a
 * server: KEYS and ARGV globals, a `redis.call` bridge into the caller's
 * command handler, and the server's conversion of the returned Lua value into
 * a reply (numbers truncate to integers, false and nil become null).
 */

import fengari from 'fengari';
import { err, ok, type Result } from 'neverthrow';

const { lua, lauxlib, lualib, to_jsstring, to_luastring } = fengari;

type LuaState = fengari.LuaState;

export type ScriptReply = number | string | null | ScriptReply[];

/** Reply of a command issued through redis.call */
export type CallReply = number | string | null | { status: string };

/**
 * Executes one command issued through redis.call. The command name is lower
 * case. Throwing raises a script error carrying the thrown message.
 */
export type RedisCallHandler = (command: string, args: string[]) => CallReply;

// ─────────────────────────────────────────────────────────────────────────────
// Stack helpers
// ─────────────────────────────────────────────────────────────────────────────

const readString = (L: LuaState, index: number): string => {
  const text = lua.lua_tostring(L, index);
  return text === null ? '' : to_jsstring(text);
};

const setStringArray = (L: LuaState, name: string, values: readonly string[]): void => {
  lua.lua_createtable(L, values.length, 0);
  values.forEach((value, i) => {
    lua.lua_pushstring(L, to_luastring(value));
    lua.lua_rawseti(L, -2, i + 1);
  });
  lua.lua_setglobal(L, to_luastring(name));
};

const pushCallReply = (L: LuaState, reply: CallReply): void => {
  if (reply === null) {
    lua.lua_pushboolean(L, false);
  } else if (typeof reply === 'number') {
    lua.lua_pushnumber(L, reply);
  } else if (typeof reply === 'string') {
    lua.lua_pushstring(L, to_luastring(reply));
  } else {
    lua.lua_createtable(L, 0, 1);
    lua.lua_pushstring(L, to_luastring(reply.status));
    lua.lua_setfield(L, -2, to_luastring('ok'));
  }
};

/** Reads the string field `name` of the table at `index`, if it has one */
const readStringField = (L: LuaState, index: number, name: string): string | undefined => {
  const type = lua.lua_getfield(L, index, to_luastring(name));
  const value = type === lua.LUA_TSTRING ? readString(L, -1) : undefined;
  lua.lua_pop(L, 1);
  return value;
};

/**
 * Converts the Lua value at an absolute stack index into a reply.
 * A table with an `err` field is an error reply.
 */
const readScriptReply = (L: LuaState, index: number): Result<ScriptReply, string> => {
  const type = lua.lua_type(L, index);
  if (type === lua.LUA_TNUMBER) {
    return ok(Math.trunc(lua.lua_tonumber(L, index)));
  }
  if (type === lua.LUA_TSTRING) {
    return ok(readString(L, index));
  }
  if (type === lua.LUA_TBOOLEAN) {
    return ok(lua.lua_toboolean(L, index) ? 1 : null);
  }
  if (type !== lua.LUA_TTABLE) {
    return ok(null);
  }

  const failure = readStringField(L, index, 'err');
  if (failure !== undefined) {
    return err(failure);
  }
  const status = readStringField(L, index, 'ok');
  if (status !== undefined) {
    return ok(status);
  }

  const items: ScriptReply[] = [];
  const length = lua.lua_rawlen(L, index);
  for (let i = 1; i <= length; i++) {
    lua.lua_rawgeti(L, index, i);
    const item = readScriptReply(L, lua.lua_gettop(L));
    lua.lua_pop(L, 1);
    if (item.isErr()) {
      return item;
    }
    items.push(item.value);
  }
  return ok(items);
};

const createRedisCall =
  (handler: RedisCallHandler) =>
  (L: LuaState): number => {
    const parts: string[] = [];
    for (let i = 1; i <= lua.lua_gettop(L); i++) {
      parts.push(readString(L, i));
    }
    const [command = '', ...args] = parts;

    let reply: CallReply;
    try {
      reply = handler(command.toLowerCase(), args);
    } catch (cause) {
      // lua_error unwinds by throwing, so it is raised outside the try block
      lua.lua_pushstring(L, to_luastring(cause instanceof Error ? cause.message : String(cause)));
      return lua.lua_error(L);
    }

    pushCallReply(L, reply);
    return 1;
  };

// ─────────────────────────────────────────────────────────────────────────────
// Runner
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Runs a script in a fresh interpreter. Errors come back as their message.
 */
export const runLuaScript = (
  script: string,
  keys: readonly string[],
  args: readonly string[],
  handler: RedisCallHandler
): Result<ScriptReply, string> => {
  const L = lauxlib.luaL_newstate();
  lualib.luaL_openlibs(L);

  setStringArray(L, 'KEYS', keys);
  setStringArray(L, 'ARGV', args);

  lua.lua_createtable(L, 0, 1);
  lua.lua_pushcfunction(L, createRedisCall(handler));
  lua.lua_setfield(L, -2, to_luastring('call'));
  lua.lua_setglobal(L, to_luastring('redis'));

  if (lauxlib.luaL_loadstring(L, to_luastring(script)) !== lua.LUA_OK) {
    return err(readString(L, -1));
  }
  if (lua.lua_pcall(L, 0, 1, 0) !== lua.LUA_OK) {
    return err(readString(L, -1));
  }
  return readScriptReply(L, lua.lua_gettop(L));
};
