/**
 * Fire-and-forget power commands for the whole speaker set.
 */
export interface SpeakerSwitchPort {
  switchOn(): void;
  switchOff(): void;
}
