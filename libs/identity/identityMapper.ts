import { v5 as uuidv5 } from 'uuid';

/**
 * Stable correlation key for a principal's registry consumer.
 *
 * Derived as a name-based (v5) UUID so every instance computes the same
 * value without coordination. The registry's authority for identity stays
 * the consumer username; this key is stored as the consumer's custom_id and
 * echoed in responses and logs for correlation.
 */
export type ConsumerKey = string;

// RFC 4122 DNS namespace
export const CONSUMER_KEY_NAMESPACE = '6ba7b810-9dad-11d1-80b4-00c04fd430c8';

export const IdentityMapper = {
    resolve: (principal: string): ConsumerKey => uuidv5(principal, CONSUMER_KEY_NAMESPACE)
};
