import { getIdIndex, getIdSequence, INVALID_ID, type PackedId, serId } from '../utils/packed-id';

/**
 * a packed 52 bit number containing a character index and sequence number
 * bits 1-32: character index (32 bits)
 * bits 33-52: sequence number (20 bits)
 **/
export type CharacterId = PackedId;

/** serializes a character index and sequence number into a packed CharacterId */
export const serCharacterId: (index: number, sequence: number) => CharacterId = serId;

/** deserializes the character index from a packed CharacterId */
export const getCharacterIdIndex: (id: CharacterId) => number = getIdIndex;

/** deserializes the sequence number from a packed CharacterId */
export const getCharacterIdSequence: (id: CharacterId) => number = getIdSequence;

/** an invalid CharacterId */
export const INVALID_CHARACTER_ID: CharacterId = INVALID_ID;
