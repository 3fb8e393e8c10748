import { ClientSession, FilterQuery, connection, mongo } from "mongoose";
import { v4 as uuid } from "uuid";
import { CaseUpdate } from "../../app/Models/CaseUpdate";
import { DeliveryFailure } from "../../app/Models/DeliveryFailure";
import { Notification } from "../../app/Models/Notification";
import { Report } from "../../app/Models/Report";
import { User } from "../../app/Models/User";
import { CaseUpdateDocument } from "../../database/schemas/CaseUpdateSchema";
import { DeliveryFailureDocument } from "../../database/schemas/DeliveryFailureSchema";
import { NotificationDocument } from "../../database/schemas/NotificationSchema";
import { ReportDocument } from "../../database/schemas/ReportSchema";
import { UserDocument } from "../../database/schemas/UserSchema";
import { CaseUpdateRecord } from "../../types/CaseUpdateInterface";
import { FailedDelivery, InboxNotification } from "../../types/NotificationInterface";
import { ReportRecord } from "../../types/ReportInterface";
import { DirectoryUser } from "../../types/UserInterface";
import { UserRoleEnum } from "../../types/enums/userRoleEnum";
import { ConcurrentModification } from "../errors";
import {
  CaseUpdateStore,
  FailedDeliveryStore,
  InboxStore,
  NewFailedDelivery,
  NewInboxNotification,
  ReportListQuery,
  ReportQuery,
  ReportStore,
  StoreSession,
  UserDirectory,
} from "../stores";

class MongoStoreSession implements StoreSession {
  readonly kind = "mongo";
  constructor(readonly client: ClientSession) {}
}

function clientOf(session?: StoreSession): ClientSession | undefined {
  if (!session) return undefined;
  if (session instanceof MongoStoreSession) return session.client;
  throw new Error(`Mongo stores cannot join a ${session.kind} session`);
}

const DUPLICATE_KEY = 11000;

function isDuplicateKey(error: unknown): boolean {
  return error instanceof mongo.MongoServerError && error.code === DUPLICATE_KEY;
}

function toReport(doc: ReportDocument): ReportRecord {
  return {
    id: doc._id,
    creatorId: doc.creatorId ?? null,
    category: doc.category,
    description: doc.description,
    location: {
      lat: doc.location.lat,
      lon: doc.location.lon,
      ...(doc.location.address ? { address: doc.location.address } : {}),
      ...(doc.location.city ? { city: doc.location.city } : {}),
    },
    images: [...(doc.images ?? [])],
    priority: doc.priority,
    status: doc.status,
    assigneeId: doc.assigneeId ?? null,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
    closedAt: doc.closedAt ?? null,
    version: doc.version,
  };
}

function fromReport(report: ReportRecord): ReportDocument {
  const { id, ...rest } = report;
  return { _id: id, ...rest };
}

function toCaseUpdate(doc: CaseUpdateDocument): CaseUpdateRecord {
  const { _id, ...rest } = doc;
  return { id: _id, ...rest, note: rest.note ?? null };
}

export class MongoReportStore implements ReportStore {
  /** Requires a replica set; standalone servers reject multi-document transactions. */
  async transaction(work: (session: StoreSession) => Promise<void>): Promise<void> {
    await connection.transaction((client) => work(new MongoStoreSession(client)));
  }

  async insert(report: ReportRecord): Promise<void> {
    await Report.create(fromReport(report));
  }

  async findById(id: string): Promise<ReportRecord | null> {
    const doc = await Report.findById(id).lean<ReportDocument>();
    return doc ? toReport(doc) : null;
  }

  async save(report: ReportRecord, expectedVersion: number, session?: StoreSession): Promise<void> {
    const { _id, ...fields } = fromReport(report);
    const result = await Report.updateOne(
      { _id, version: expectedVersion },
      { $set: fields },
      { session: clientOf(session) }
    );
    if (result.matchedCount === 0) throw new ConcurrentModification(report.id, expectedVersion);
  }

  async scan(query: ReportQuery): Promise<ReportRecord[]> {
    const filter: FilterQuery<ReportDocument> = {};
    if (query.from || query.to) {
      filter.createdAt = {
        ...(query.from ? { $gte: query.from } : {}),
        ...(query.to ? { $lte: query.to } : {}),
      };
    }
    if (query.statuses) filter.status = { $in: [...query.statuses] };
    if (query.category) filter.category = query.category;
    const docs = await Report.find(filter).lean<ReportDocument[]>();
    return docs.map(toReport);
  }

  async list(query: ReportListQuery): Promise<ReportRecord[]> {
    const filter: FilterQuery<ReportDocument> = {};
    if (query.creatorId) filter.creatorId = query.creatorId;
    if (query.assigneeId) filter.assigneeId = query.assigneeId;
    if (query.status) filter.status = query.status;
    if (query.priority) filter.priority = query.priority;
    const docs = await Report.find(filter).sort({ createdAt: -1 }).limit(query.limit).lean<ReportDocument[]>();
    return docs.map(toReport);
  }
}

export class MongoCaseUpdateStore implements CaseUpdateStore {
  async append(update: CaseUpdateRecord, session?: StoreSession): Promise<void> {
    const { id, ...rest } = update;
    await CaseUpdate.create([{ _id: id, ...rest }], { session: clientOf(session) });
  }

  async last(reportId: string, session?: StoreSession): Promise<CaseUpdateRecord | null> {
    const doc = await CaseUpdate.findOne({ reportId })
      .sort({ sequence: -1 })
      .session(clientOf(session) ?? null)
      .lean<CaseUpdateDocument>();
    return doc ? toCaseUpdate(doc) : null;
  }

  async list(reportId: string): Promise<CaseUpdateRecord[]> {
    const docs = await CaseUpdate.find({ reportId }).sort({ sequence: 1 }).lean<CaseUpdateDocument[]>();
    return docs.map(toCaseUpdate);
  }
}

export class MongoUserDirectory implements UserDirectory {
  async findById(id: string): Promise<DirectoryUser | null> {
    const doc = await User.findById(id).lean<UserDocument>();
    if (!doc) return null;
    return {
      id: doc._id,
      name: doc.name,
      email: doc.email ?? null,
      phone: doc.phone ?? null,
      role: doc.role,
      isActive: doc.isActive,
      pushTokens: [...(doc.pushTokens ?? [])],
    };
  }

  async listAdministratorIds(): Promise<string[]> {
    const docs = await User.find({ role: UserRoleEnum.ADMIN, isActive: true })
      .select("_id")
      .lean<Pick<UserDocument, "_id">[]>();
    return docs.map((d) => d._id);
  }
}

export class MongoFailedDeliveryStore implements FailedDeliveryStore {
  async record(failure: NewFailedDelivery): Promise<void> {
    await DeliveryFailure.create({ _id: uuid(), ...failure, status: "pending", createdAt: new Date() });
  }

  async listPending(limit: number): Promise<FailedDelivery[]> {
    const docs = await DeliveryFailure.find({ status: "pending" })
      .sort({ createdAt: 1 })
      .limit(limit)
      .lean<DeliveryFailureDocument[]>();
    return docs.map(({ _id, ...rest }) => ({ id: _id, ...rest }));
  }

  async mark(id: string, status: "requeued" | "abandoned"): Promise<void> {
    await DeliveryFailure.updateOne({ _id: id }, { $set: { status } });
  }

  async spendRound(id: string): Promise<void> {
    await DeliveryFailure.updateOne({ _id: id, status: "pending" }, { $inc: { rounds: 1 } });
  }
}

function toInbox(doc: NotificationDocument): InboxNotification {
  const { _id, ...rest } = doc;
  return { id: _id, ...rest, readAt: rest.readAt ?? null };
}

export class MongoInboxStore implements InboxStore {
  async insertOnce(notification: NewInboxNotification): Promise<boolean> {
    try {
      const result = await Notification.updateOne(
        { eventId: notification.eventId, userId: notification.userId },
        { $setOnInsert: { _id: uuid(), ...notification, readAt: null, createdAt: new Date() } },
        { upsert: true }
      );
      return result.upsertedCount === 1;
    } catch (error) {
      // Two upserts racing on the unique index: the other one won.
      if (isDuplicateKey(error)) return false;
      throw error;
    }
  }

  async listForUser(userId: string, limit: number): Promise<InboxNotification[]> {
    const docs = await Notification.find({ userId })
      .sort({ createdAt: -1 })
      .limit(limit)
      .lean<NotificationDocument[]>();
    return docs.map(toInbox);
  }

  async markRead(id: string, userId: string): Promise<InboxNotification | null> {
    const updated = await Notification.findOneAndUpdate(
      { _id: id, userId, readAt: null },
      { $set: { readAt: new Date() } },
      { new: true }
    ).lean<NotificationDocument>();
    if (updated) return toInbox(updated);
    const existing = await Notification.findOne({ _id: id, userId }).lean<NotificationDocument>();
    return existing ? toInbox(existing) : null;
  }

  async markAllRead(userId: string): Promise<number> {
    const result = await Notification.updateMany({ userId, readAt: null }, { $set: { readAt: new Date() } });
    return result.modifiedCount;
  }

  async countUnread(userId: string): Promise<number> {
    return Notification.countDocuments({ userId, readAt: null });
  }
}
