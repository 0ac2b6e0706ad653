/**
 * Humble Object for host storage APIs.
 * Isolates localStorage calls for testability; outside a browser every read
 * returns null and writes are dropped.
 */
export const DeviceService = {
	getStorageItem(key: string): string | null {
		try {
			return localStorage.getItem(key);
		} catch {
			return null;
		}
	},

	setStorageItem(key: string, value: string): void {
		try {
			localStorage.setItem(key, value);
		} catch {
			// localStorage not available
		}
	},
};
