// Keep test output free of telemetry lines; events are still stored.
process.env.INVENTORY_TELEMETRY_LOGS = 'false';
