/**
 * fastscroll - Events Domain
 */

export { createEmitter, type Emitter } from "./emitter";
