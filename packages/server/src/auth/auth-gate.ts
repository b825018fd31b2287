/**
 * Admission control: a valid credential, and membership of the chat.
 */

import { AuthenticationError, AuthorizationError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { ChatStore } from "../storage/chat-store.js";
import type { CredentialValidator, Identity } from "./credential.js";

export interface AuthGateOptions {
  validateCredential: CredentialValidator;
  store: Pick<ChatStore, "isParticipant">;
  logger: Logger;
}

export class AuthGate {
  private readonly validateCredential: CredentialValidator;
  private readonly store: Pick<ChatStore, "isParticipant">;
  private readonly logger: Logger;

  constructor(options: AuthGateOptions) {
    this.validateCredential = options.validateCredential;
    this.store = options.store;
    this.logger = options.logger.child({ component: "auth-gate" });
  }

  /**
   * Resolve the caller and check they belong to the chat. Throws
   * AuthenticationError or AuthorizationError.
   */
  async admit(token: string | null | undefined, chatId: string): Promise<Identity> {
    if (!token) {
      throw new AuthenticationError("Missing credential");
    }
    let identity: Identity | null;
    try {
      identity = await this.validateCredential(token);
    } catch (err) {
      this.logger.warn({ err, chatId }, "credential validator failed");
      identity = null;
    }
    if (!identity) {
      throw new AuthenticationError("Invalid credential");
    }
    if (!(await this.store.isParticipant(chatId, identity.userId))) {
      this.logger.info({ chatId, userId: identity.userId }, "admission refused, not a participant");
      throw new AuthorizationError(chatId, identity.userId);
    }
    return identity;
  }
}
