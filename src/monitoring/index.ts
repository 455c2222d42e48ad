export { DashboardServer, toProfileResponse } from './dashboard-server';
export type { DashboardServerOptions } from './dashboard-server';
