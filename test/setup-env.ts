// Test runs never reach a real queue, bucket or database
process.env.NODE_ENV = 'test'
process.env.QUEUE_OFFLINE = 'true'
process.env.QUEUE_POLL_INTERVAL_MS = '20'
process.env.QUEUE_SHUTDOWN_GRACE_MS = '1000'
process.env.DATABASE_ENABLED = 'false'
process.env.ENABLE_CONSOLE_LOGS = 'false'
process.env.LOG_LEVEL = 'silent'

delete process.env.STORAGE_BUCKET
delete process.env.QUEUE_ACCESS_KEY_ID
delete process.env.QUEUE_SECRET_ACCESS_KEY
