/**
 * Store module - Account balances
 */

export { AccountStore, type AccountReader } from "./account-store.js";
