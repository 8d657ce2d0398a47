process.env['NATS_SERVERS'] ??= 'nats://localhost:4222';
