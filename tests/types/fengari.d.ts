/**
 * Declarations for the parts of fengari's C-style API the test fixtures use.
 */

declare module 'fengari' {
  namespace fengari {
    /** Opaque interpreter state */
    interface LuaState {
      readonly __brand: 'LuaState';
    }

    /** Lua strings are byte arrays */
    type LuaString = Uint8Array;

    type LuaCFunction = (L: LuaState) => number;

    interface LuaApi {
      readonly LUA_OK: number;
      readonly LUA_TNIL: number;
      readonly LUA_TBOOLEAN: number;
      readonly LUA_TNUMBER: number;
      readonly LUA_TSTRING: number;
      readonly LUA_TTABLE: number;

      lua_gettop(L: LuaState): number;
      lua_type(L: LuaState, index: number): number;
      lua_pop(L: LuaState, n: number): void;
      lua_toboolean(L: LuaState, index: number): boolean;
      lua_tonumber(L: LuaState, index: number): number;
      lua_tostring(L: LuaState, index: number): LuaString | null;
      lua_pushnil(L: LuaState): void;
      lua_pushboolean(L: LuaState, b: boolean): void;
      lua_pushnumber(L: LuaState, n: number): void;
      lua_pushstring(L: LuaState, s: LuaString): LuaString;
      lua_pushcfunction(L: LuaState, fn: LuaCFunction): void;
      lua_createtable(L: LuaState, narr: number, nrec: number): void;
      lua_setfield(L: LuaState, index: number, k: LuaString): void;
      lua_getfield(L: LuaState, index: number, k: LuaString): number;
      lua_rawseti(L: LuaState, index: number, n: number): void;
      lua_rawgeti(L: LuaState, index: number, n: number): number;
      lua_rawlen(L: LuaState, index: number): number;
      lua_setglobal(L: LuaState, name: LuaString): void;
      lua_pcall(L: LuaState, nargs: number, nresults: number, msgh: number): number;
      lua_error(L: LuaState): number;
    }

    interface LuaAuxLib {
      luaL_newstate(): LuaState;
      luaL_loadstring(L: LuaState, s: LuaString): number;
    }

    interface LuaLib {
      luaL_openlibs(L: LuaState): void;
    }

    const lua: LuaApi;
    const lauxlib: LuaAuxLib;
    const lualib: LuaLib;

    function to_luastring(s: string): LuaString;
    function to_jsstring(s: LuaString): string;
  }

  export = fengari;
}
