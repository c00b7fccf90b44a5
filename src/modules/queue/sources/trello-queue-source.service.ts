/**
 * TrelloQueueSource: the queue lives on a Trello board.
 *
 * Lists:
 * - Queue: items waiting to play, in board order
 * - Now Playing: the item being acquired or streamed
 * - Played: completed items
 * - Failed: items that will not be retried (a comment carries the reason)
 *
 * The board is resolved by name on first use; missing lists are created.
 * Trello REST API docs: https://developer.atlassian.com/cloud/trello/rest/
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import axios, { type AxiosInstance } from 'axios';
import trelloConfig from '../../../config/trello.config';
import type { AttachmentRef } from '../../../common/interfaces/attachment.interface';
import type {
  QueueItem,
  QueueItemState,
} from '../interfaces/queue-item.interface';
import type { QueueSource } from '../interfaces/queue-source.interface';

// ============================================================================
// TYPES
// ============================================================================

export interface TrelloBoard {
  id: string;
  name: string;
}

export interface TrelloList {
  id: string;
  name: string;
}

export interface TrelloCard {
  id: string;
  name: string;
  desc: string;
  pos: number;
  idList: string;
}

export interface TrelloAttachment {
  id: string;
  name: string;
  url: string;
  mimeType?: string | null;
  bytes?: number | null;
  /** True for files uploaded to Trello; false for plain links */
  isUpload: boolean;
}

type ListRole = 'queue' | 'nowPlaying' | 'played' | 'failed';

interface BoardLayout {
  board: TrelloBoard;
  lists: Record<ListRole, TrelloList>;
}

const LIST_ROLES: readonly ListRole[] = ['queue', 'nowPlaying', 'played', 'failed'];

const STATE_LIST: Record<QueueItemState, ListRole> = {
  QUEUED: 'queue',
  ACQUIRING: 'nowPlaying',
  STREAMING: 'nowPlaying',
  COMPLETED: 'played',
  FAILED: 'failed',
};

// ============================================================================
// SERVICE
// ============================================================================

@Injectable()
export class TrelloQueueSource implements QueueSource {
  private readonly logger = new Logger(TrelloQueueSource.name);
  private readonly client: AxiosInstance;
  private layout: Promise<BoardLayout> | null = null;
  /** Last list each card was seen in or moved to */
  private readonly cardLists = new Map<string, string>();

  constructor(
    @Inject(trelloConfig.KEY)
    private readonly config: ConfigType<typeof trelloConfig>,
  ) {
    this.client = axios.create({
      baseURL: this.config.apiUrl,
      params: { key: this.config.apiKey, token: this.config.token },
      timeout: this.config.requestTimeoutMs,
    });
  }

  async listEligibleItems(): Promise<QueueItem[]> {
    const { lists } = await this.getLayout();
    const { data: cards } = await this.client.get<TrelloCard[]>(
      `/lists/${lists.queue.id}/cards`,
      { params: { fields: 'name,desc,pos,idList' } },
    );

    // Forget queue cards that were moved or deleted on the board
    const listed = new Set(cards.map((card) => card.id));
    for (const [id, listId] of this.cardLists) {
      if (listId === lists.queue.id && !listed.has(id)) {
        this.cardLists.delete(id);
      }
    }

    return [...cards]
      .sort((a, b) => a.pos - b.pos)
      .map((card): QueueItem => {
        this.cardLists.set(card.id, card.idList);
        return {
          id: card.id,
          name: card.name,
          description: card.desc,
          position: card.pos,
          state: 'QUEUED',
          attempts: 0,
          lastAttemptAt: null,
        };
      });
  }

  async reportState(
    item: QueueItem,
    state: QueueItemState,
    detail?: string,
  ): Promise<void> {
    const { lists } = await this.getLayout();
    const role = STATE_LIST[state];
    const target = lists[role];

    // Requeued items go to the back of the queue
    const requeue = state === 'QUEUED';
    if (requeue || this.cardLists.get(item.id) !== target.id) {
      await this.client.put(`/cards/${item.id}`, null, {
        params: { idList: target.id, pos: requeue ? 'bottom' : 'top' },
      });
      this.cardLists.set(item.id, target.id);
      this.logger.log(`Moved card '${item.name}' to '${target.name}'`);
    }

    if (state === 'FAILED' && detail) {
      await this.client.post(`/cards/${item.id}/actions/comments`, null, {
        params: { text: `Playback failed: ${detail}` },
      });
    }

    if (state === 'COMPLETED' || state === 'FAILED') {
      this.cardLists.delete(item.id);
    }
  }

  /** Cards whose list position is tracked locally */
  trackedCardIds(): string[] {
    return [...this.cardLists.keys()];
  }

  /** First attachment of the card, or null when it has none. */
  async getAttachment(item: QueueItem): Promise<AttachmentRef | null> {
    const { data: attachments } = await this.client.get<TrelloAttachment[]>(
      `/cards/${item.id}/attachments`,
    );
    const first = attachments[0];
    if (!first) return null;

    return {
      id: first.id,
      name: first.name,
      url: first.url,
      mimeType: first.mimeType ?? undefined,
      bytes: first.bytes ?? undefined,
      // Uploaded files need board credentials; links to other hosts must not get them
      headers: first.isUpload ? { Authorization: this.authorizationHeader() } : {},
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // BOARD LAYOUT
  // ─────────────────────────────────────────────────────────────────────────

  private getLayout(): Promise<BoardLayout> {
    if (!this.layout) {
      this.layout = this.resolveLayout().catch((error: unknown) => {
        // Retry on the next call
        this.layout = null;
        throw error;
      });
    }
    return this.layout;
  }

  private async resolveLayout(): Promise<BoardLayout> {
    const { data: boards } = await this.client.get<TrelloBoard[]>(
      '/members/me/boards',
      { params: { fields: 'name', filter: 'open' } },
    );
    this.logger.log(`Connected to Trello. Found ${boards.length} boards`);

    const board = boards.find((b) => b.name === this.config.boardName);
    if (!board) {
      throw new Error(
        `Board '${this.config.boardName}' not found. Available boards: ${boards
          .map((b) => b.name)
          .join(', ')}`,
      );
    }
    this.logger.log(`Found board: ${board.name} (ID: ${board.id})`);

    const { data: existing } = await this.client.get<TrelloList[]>(
      `/boards/${board.id}/lists`,
      { params: { fields: 'name', filter: 'open' } },
    );

    const lists: Partial<Record<ListRole, TrelloList>> = {};
    for (const role of LIST_ROLES) {
      const name = this.config.lists[role];
      const found = existing.find((list) => list.name === name);
      if (found) {
        lists[role] = found;
        this.logger.log(`Using existing list: ${name}`);
        continue;
      }

      const { data: created } = await this.client.post<TrelloList>(
        '/lists',
        null,
        { params: { name, idBoard: board.id, pos: 'bottom' } },
      );
      lists[role] = created;
      this.logger.log(`Created new list: ${name}`);
    }

    return { board, lists: completeLists(lists) };
  }

  private authorizationHeader(): string {
    return `OAuth oauth_consumer_key="${this.config.apiKey}", oauth_token="${this.config.token}"`;
  }
}

function completeLists(
  lists: Partial<Record<ListRole, TrelloList>>,
): Record<ListRole, TrelloList> {
  const { queue, nowPlaying, played, failed } = lists;
  if (!queue || !nowPlaying || !played || !failed) {
    throw new Error('Trello board layout is incomplete');
  }
  return { queue, nowPlaying, played, failed };
}
