import type { Logger } from "../lib/log";
import type { Enrollment } from "../models/enrollment";
import type { CompositeProfile, MemberRecord, PrimaryProfile, StudioMembership, Subscription } from "../models/profile";
import type { Program } from "../models/program";
import type { ProgramProgress, RankProgress } from "../models/progress";
import { ChangeNotifier } from "./changeNotifier";

export type ChannelEntities = {
  program: Program;
  enrollment: Enrollment;
  progress: ProgramProgress;
  rankProgress: RankProgress;
  profile: PrimaryProfile;
  subscription: Subscription;
  studioMembership: StudioMembership;
  member: MemberRecord;
  composite: CompositeProfile;
};

export type ChannelName = keyof ChannelEntities;

export type Channels = { [K in ChannelName]: ChangeNotifier<ChannelEntities[K]> };

/** The one piece of state shared across repositories: a notifier per entity kind. */
export class ChangeHub {
  readonly channels: Channels;

  constructor(bufferSize = 256, logger?: Logger, clock: () => number = Date.now) {
    this.channels = {
      program: new ChangeNotifier("program", bufferSize, logger, clock),
      enrollment: new ChangeNotifier("enrollment", bufferSize, logger, clock),
      progress: new ChangeNotifier("progress", bufferSize, logger, clock),
      rankProgress: new ChangeNotifier("rankProgress", bufferSize, logger, clock),
      profile: new ChangeNotifier("profile", bufferSize, logger, clock),
      subscription: new ChangeNotifier("subscription", bufferSize, logger, clock),
      studioMembership: new ChangeNotifier("studioMembership", bufferSize, logger, clock),
      member: new ChangeNotifier("member", bufferSize, logger, clock),
      composite: new ChangeNotifier("composite", bufferSize, logger, clock),
    };
  }

  closeAll(): void {
    for (const channel of Object.values(this.channels)) channel.closeAll();
  }
}
