/**
 * Action executor.
 *
 * Applies one workflow action to one email through the mail provider and
 * describes the matching change to local state. The local change is not
 * written here: the caller commits it together with the activity row.
 */

import type { Email } from "../types/email.js";
import type { WorkflowAction } from "../types/workflow.js";
import type { MailProvider, ProviderAction } from "../providers/mail-provider.js";
import type { FolderRepository } from "../storage/folders.js";
import type { EmailRepository } from "../storage/emails.js";
import type { Logger } from "../logger.js";
import { ActionError, errorMessage } from "../errors.js";

export type ActionResult =
  | {
      ok: true;
      action: WorkflowAction;
      /** Mirror the provider change locally; run inside a transaction */
      commitLocal: () => void;
    }
  | { ok: false; action: WorkflowAction; error: ActionError };

export interface ActionExecutorDeps {
  provider: MailProvider;
  folders: FolderRepository;
  emails: EmailRepository;
  logger: Logger;
}

export class ActionExecutor {
  private provider: MailProvider;
  private folders: FolderRepository;
  private emails: EmailRepository;
  private logger: Logger;

  constructor(deps: ActionExecutorDeps) {
    this.provider = deps.provider;
    this.folders = deps.folders;
    this.emails = deps.emails;
    this.logger = deps.logger;
  }

  /**
   * Apply `action` to `email`. Never throws for per-email problems; those
   * come back as `{ ok: false }`.
   */
  async execute(email: Email, action: WorkflowAction, target: string): Promise<ActionResult> {
    try {
      const commitLocal =
        action === "move"
          ? await this.move(email, target)
          : await this.markAsRead(email);
      return { ok: true, action, commitLocal };
    } catch (err) {
      const error =
        err instanceof ActionError
          ? err
          : new ActionError(email.id, `${action} failed for email ${email.id}: ${errorMessage(err)}`, {
              cause: err,
            });
      this.logger.warn(error.message, { emailId: email.id, providerId: email.providerId });
      return { ok: false, action, error };
    }
  }

  private async markAsRead(email: Email): Promise<() => void> {
    await this.provider.applyAction(email.providerId, { type: "mark_as_read" });
    return () => this.emails.setReadState(email.id, true);
  }

  private async move(email: Email, target: string): Promise<() => void> {
    const folder = await this.folders.findFolderByName(email.userId, target);
    if (!folder || !folder.providerId) {
      throw new ActionError(email.id, `Unknown folder "${target}" for email ${email.id}`);
    }

    const providerAction: ProviderAction = {
      type: "move",
      folderProviderId: folder.providerId,
      folderName: folder.name,
    };
    await this.provider.applyAction(email.providerId, providerAction);
    return () => this.emails.replaceFolders(email.id, [folder.id]);
  }
}
