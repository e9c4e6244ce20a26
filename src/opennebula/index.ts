/**
 * OpenNebula Module
 *
 * Exports the XML-RPC codec, transport, client and types.
 */

export * from './types.js';
export * from './xmlrpc.js';
export * from './transport.js';
export * from './client.js';
