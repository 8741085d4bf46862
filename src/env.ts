import dotenv from 'dotenv'
import process from 'node:process'

// Must be imported before anything that creates a logger
dotenv.config()

if (process.env.DEBUG === 'true') {
  process.env.LOG_LEVEL = 'debug'
}
