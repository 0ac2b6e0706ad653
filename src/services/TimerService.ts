/**
 * Humble Object for clock access.
 * Isolates performance.now() so the processor's default timestamps can be
 * replaced in tests.
 */

export const TimerService = {
	/**
	 * Current monotonic time in seconds (pointer sample timestamps).
	 */
	now(): number {
		return performance.now() / 1000;
	},
};
