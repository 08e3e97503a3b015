/**
 * Playback collaborator. Opening the file is best effort: implementations report
 * failure through the return value rather than by throwing.
 */
export type Player = {
  /**
   * @returns Whether the player was started
   */
  play(path: string): Promise<boolean>;
};
